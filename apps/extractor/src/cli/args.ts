/**
 * CLI Argument Parsing
 *
 * Usage:
 *   mdna-extract <input-dir> [options]
 *
 * Options:
 *   --output=DIR         Write results here instead of extraction.output_dir
 *   --env=NAME           Configuration environment (development, production, test)
 *   --config-dir=DIR     Directory holding default.yaml and <env>.yaml
 *   --ciks=a,b           Only process these CIKs
 *   --forms=10-K,10-Q    Only process these form types
 *   --years=2020,2021    Only process filings from these years
 *   --concurrency=N      Documents processed at once
 */

import { type ConfigEnvironment, type ExtractorConfig, ExtractorConfigSchema } from "@mdna/config";

// ============================================
// Types
// ============================================

export interface CliOptions {
	inputDir?: string;
	outputDir?: string;
	environment?: ConfigEnvironment;
	configDir?: string;
	ciks: string[];
	forms: string[];
	years: number[];
	concurrency?: number;
	help: boolean;
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

// ============================================
// Parsing
// ============================================

function splitList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

function parseInteger(flag: string, value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new UsageError(`${flag} expects a whole number, got "${value}"`);
	}
	return Number.parseInt(value, 10);
}

function parseEnvironment(value: string): ConfigEnvironment {
	switch (value) {
		case "development":
		case "production":
		case "test":
			return value;
		default:
			throw new UsageError(`--env must be development, production or test, got "${value}"`);
	}
}

/**
 * Parse `process.argv.slice(2)`.
 *
 * @throws UsageError on unknown flags, malformed values or a second positional argument
 */
export function parseArgs(args: readonly string[]): CliOptions {
	const options: CliOptions = { ciks: [], forms: [], years: [], help: false };

	for (const arg of args) {
		if (arg === "--help" || arg === "-h") {
			options.help = true;
			continue;
		}

		if (!arg.startsWith("--")) {
			if (options.inputDir !== undefined) {
				throw new UsageError(`Unexpected argument: ${arg}`);
			}
			options.inputDir = arg;
			continue;
		}

		const eq = arg.indexOf("=");
		const flag = eq === -1 ? arg : arg.slice(0, eq);
		const value = eq === -1 ? "" : arg.slice(eq + 1);
		if (value.length === 0) {
			throw new UsageError(`${flag} requires a value (${flag}=...)`);
		}

		switch (flag) {
			case "--output":
				options.outputDir = value;
				break;
			case "--env":
				options.environment = parseEnvironment(value);
				break;
			case "--config-dir":
				options.configDir = value;
				break;
			case "--ciks":
				options.ciks = splitList(value);
				break;
			case "--forms":
				options.forms = splitList(value).map((form) => form.toUpperCase());
				break;
			case "--years":
				options.years = splitList(value).map((year) => parseInteger(flag, year));
				break;
			case "--concurrency":
				options.concurrency = parseInteger(flag, value);
				break;
			default:
				throw new UsageError(`Unknown option: ${flag}`);
		}
	}

	return options;
}

// ============================================
// Config Overrides
// ============================================

/**
 * Apply command-line overrides to the loaded configuration and re-validate.
 * Filter lists given on the command line replace the configured ones.
 *
 * @throws ZodError when an override is out of range (e.g. an unknown form type)
 */
export function applyOverrides(config: ExtractorConfig, options: CliOptions): ExtractorConfig {
	return ExtractorConfigSchema.parse({
		...config,
		extraction: {
			...config.extraction,
			output_dir: options.outputDir ?? config.extraction.output_dir,
			concurrency: options.concurrency ?? config.extraction.concurrency,
		},
		filter: {
			ciks: options.ciks.length > 0 ? options.ciks : config.filter.ciks,
			form_types: options.forms.length > 0 ? options.forms : config.filter.form_types,
			years: options.years.length > 0 ? options.years : config.filter.years,
		},
	});
}

export const USAGE = `
MD&A Extractor

Usage:
  mdna-extract <input-dir> [options]

Options:
  --output=DIR          Write results here instead of extraction.output_dir
  --env=NAME            Configuration environment (development, production, test)
  --config-dir=DIR      Directory holding default.yaml and <env>.yaml
  --ciks=a,b            Only process these CIKs (comma-separated)
  --forms=10-K,10-Q     Only process these form types
  --years=2020,2021     Only process filings from these years
  --concurrency=N       Documents processed at once

Examples:
  mdna-extract data/filings
  mdna-extract data/filings --output=out --forms=10-K --years=2021
`;
