/**
 * Configuration Loader
 *
 * Loads and merges YAML configuration files with environment-specific overrides.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { deepmergeCustom } from "deepmerge-ts";
import { parse } from "yaml";
import { log } from "./logger.js";
import { type ExtractorConfig, ExtractorConfigSchema } from "./schemas/extraction.js";

/**
 * Environment type for config loading
 */
export type ConfigEnvironment = "development" | "production" | "test";

/**
 * Directory holding the YAML files shipped with this package
 */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL("../configs", import.meta.url));

// Arrays in an override replace the defaults rather than appending
const mergeConfig = deepmergeCustom({ mergeArrays: false });

/**
 * Load and parse a YAML file
 *
 * @throws Error if file cannot be read or parsed
 */
async function loadYaml(path: string): Promise<unknown> {
  try {
    const content = await readFile(path, "utf-8");
    return parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load YAML from ${path}: ${message}`);
  }
}

function asObject(value: unknown): Record<string, unknown> {
  if (value === null || value === undefined) {
    return {};
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    throw new Error("Configuration root must be a mapping");
  }
  return { ...value };
}

/**
 * Load configuration with environment-specific overrides
 *
 * Loads default.yaml, then merges <environment>.yaml over it when present.
 *
 * @param environment - The environment to load config for
 * @param configDir - Base directory for config files
 * @returns Validated configuration object
 * @throws ZodError if the merged configuration is invalid
 */
export async function loadConfig(
  environment: ConfigEnvironment,
  configDir = DEFAULT_CONFIG_DIR
): Promise<ExtractorConfig> {
  const base = asObject(await loadYaml(join(configDir, "default.yaml")));

  let override: Record<string, unknown> = {};
  try {
    override = asObject(await loadYaml(join(configDir, `${environment}.yaml`)));
  } catch (error) {
    // Environment override is optional
    log.debug(
      { environment, configDir, error: error instanceof Error ? error.message : String(error) },
      "No environment override, using defaults only"
    );
  }

  const merged = mergeConfig(base, override);

  return ExtractorConfigSchema.parse(merged);
}

/**
 * Load configuration from a specific file
 *
 * @throws Error if the file cannot be read or fails validation
 */
export async function loadConfigFromFile(path: string): Promise<ExtractorConfig> {
  const content = await loadYaml(path);
  return ExtractorConfigSchema.parse(asObject(content));
}

/**
 * Resolve the environment from MDNA_ENV, then NODE_ENV
 */
export function resolveEnvironment(): ConfigEnvironment {
  const value = process.env.MDNA_ENV ?? process.env.NODE_ENV;
  if (value === "production" || value === "test") {
    return value;
  }
  return "development";
}
