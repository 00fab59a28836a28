/**
 * Extraction Configuration Schema
 *
 * Options for the MD&A extraction engine: table acceptance thresholds,
 * text cleaning policy, section validation limits, batch filtering and
 * output location. All sections default, so `{}` is a valid config.
 */

import { z } from "zod";

// ============================================
// Enums
// ============================================

/**
 * Pattern set used by the line classifier and table detector.
 *
 * - basic: broad keyword matching, higher recall
 * - extended: anchored SEC statement patterns, higher precision
 */
export const PatternSetName = z.enum(["basic", "extended"]);
export type PatternSetName = z.infer<typeof PatternSetName>;

/**
 * What to do with C0/C1 control characters (tab and newline are never touched)
 */
export const ControlCharPolicy = z.enum(["replace", "strip", "keep"]);
export type ControlCharPolicy = z.infer<typeof ControlCharPolicy>;

export const FormTypeName = z.enum(["10-K", "10-K/A", "10-Q", "10-Q/A"]);
export type FormTypeName = z.infer<typeof FormTypeName>;

// ============================================
// Sections
// ============================================

export const ExtractionSettingsSchema = z.object({
  /**
   * Directory extraction results are written to
   */
  output_dir: z.string().min(1).default("output"),

  /**
   * Documents processed at once by the batch driver
   */
  concurrency: z.number().int().positive().max(64).default(4),

  /**
   * File extensions picked up from the input directory (case-sensitive)
   */
  file_extensions: z.array(z.string().startsWith(".")).min(1).default([".txt", ".TXT"]),
});
export type ExtractionSettings = z.infer<typeof ExtractionSettingsSchema>;

export const TableSettingsSchema = z.object({
  pattern_set: PatternSetName.default("extended"),

  /**
   * Minimum non-blank lines for a table region
   */
  min_rows: z.number().int().min(1).default(2),

  /**
   * Minimum cells in the widest row of a table region
   */
  min_columns: z.number().int().min(1).default(2),

  /**
   * Hard stop for header-anchored region growth
   */
  max_region_lines: z.number().int().min(2).default(50),

  /**
   * Consecutive blank lines tolerated inside a table region
   */
  max_blank_lines: z.number().int().min(0).max(10).default(2),

  /**
   * Move a region's first line up to its detected title
   */
  title_in_region: z.boolean().default(false),
});
export type TableSettings = z.infer<typeof TableSettingsSchema>;

export const TextSettingsSchema = z.object({
  control_chars: ControlCharPolicy.default("replace"),
  control_char_replacement: z
    .string()
    .max(4)
    .regex(/^[^\r\n]*$/, "must not contain line breaks")
    .default(" "),
});
export type TextSettings = z.infer<typeof TextSettingsSchema>;

export const SectionSettingsSchema = z.object({
  /**
   * Below this word count the section is flagged as suspiciously short
   */
  min_words: z.number().int().min(0).default(100),

  /**
   * Above this word count the section is flagged as unusually long
   */
  max_words: z.number().int().positive().default(60_000),

  /**
   * A located section this short that mentions incorporation by reference
   * is treated as a reference rather than content
   */
  incorporation_max_words: z.number().int().min(0).default(250),
});
export type SectionSettings = z.infer<typeof SectionSettingsSchema>;

export const FilterSettingsSchema = z.object({
  ciks: z.array(z.string().regex(/^\d{1,10}$/, "CIK must be 1-10 digits")).default([]),
  form_types: z.array(FormTypeName).default([]),
  years: z.array(z.number().int().min(1993).max(2100)).default([]),
});
export type FilterSettings = z.infer<typeof FilterSettingsSchema>;

// ============================================
// Complete Schema
// ============================================

export const ExtractorConfigSchema = z.object({
  extraction: ExtractionSettingsSchema.default({}),
  tables: TableSettingsSchema.default({}),
  text: TextSettingsSchema.default({}),
  sections: SectionSettingsSchema.default({}),
  filter: FilterSettingsSchema.default({}),
});
export type ExtractorConfig = z.infer<typeof ExtractorConfigSchema>;
