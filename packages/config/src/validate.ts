/**
 * Configuration Validation
 *
 * Schema validation plus the cross-field checks run once at startup.
 */

import { type ExtractorConfig, ExtractorConfigSchema } from "./schemas/extraction.js";

// ============================================
// Validation Functions
// ============================================

/**
 * Validation result with detailed errors
 */
export type ValidationResult =
  | { success: true; data: ExtractorConfig; errors: [] }
  | { success: false; errors: string[] };

/**
 * Validate configuration object
 *
 * @param config - Raw configuration object to validate
 * @returns Validation result with parsed data or errors
 */
export function validateConfig(config: unknown): ValidationResult {
  const result = ExtractorConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data, errors: [] };
  }

  return {
    success: false,
    errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  };
}

/**
 * Validate configuration and throw on error
 *
 * @throws ZodError if validation fails
 */
export function validateConfigOrThrow(config: unknown): ExtractorConfig {
  return ExtractorConfigSchema.parse(config);
}

/**
 * Fully defaulted configuration
 */
export function defaultConfig(): ExtractorConfig {
  return ExtractorConfigSchema.parse({});
}

// ============================================
// Startup Validation
// ============================================

/**
 * Validate configuration at startup
 *
 * Schema validation followed by cross-field checks that are legal but
 * likely to produce poor extractions.
 */
export function validateAtStartup(config: unknown): ValidationResult & { warnings: string[] } {
  const baseResult = validateConfig(config);
  const warnings: string[] = [];

  if (!baseResult.success) {
    return { ...baseResult, warnings };
  }

  const cfg = baseResult.data;

  if (cfg.tables.min_rows > cfg.tables.max_region_lines) {
    warnings.push(
      `tables.min_rows (${cfg.tables.min_rows}) exceeds tables.max_region_lines (${cfg.tables.max_region_lines}); header-anchored tables can never be accepted`
    );
  }

  if (cfg.sections.min_words >= cfg.sections.max_words) {
    warnings.push("sections.min_words >= sections.max_words - every section will be flagged");
  }

  if (cfg.text.control_chars === "keep") {
    warnings.push("text.control_chars is 'keep'; control characters will be copied into output files");
  }

  if (cfg.tables.pattern_set === "basic" && cfg.tables.min_columns < 2) {
    warnings.push("basic pattern set with min_columns < 2 accepts single-column keyword runs as tables");
  }

  return { ...baseResult, warnings };
}
