/**
 * @mdna/config - Configuration schemas and loaders
 *
 * This package contains:
 * - Zod schemas for every configuration section
 * - YAML loading with environment overrides
 * - Validation utilities
 */

export {
  type ConfigEnvironment,
  DEFAULT_CONFIG_DIR,
  loadConfig,
  loadConfigFromFile,
  resolveEnvironment,
} from "./loader.js";
export * from "./schemas/index.js";
export {
  defaultConfig,
  type ValidationResult,
  validateAtStartup,
  validateConfig,
  validateConfigOrThrow,
} from "./validate.js";
