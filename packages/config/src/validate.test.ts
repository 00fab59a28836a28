import { describe, expect, it } from "vitest";
import { ExtractorConfigSchema } from "./schemas/extraction.js";
import { defaultConfig, validateAtStartup, validateConfig, validateConfigOrThrow } from "./validate.js";

describe("ExtractorConfigSchema", () => {
  it("accepts an empty object and applies defaults", () => {
    const config = ExtractorConfigSchema.parse({});
    expect(config.tables.min_rows).toBe(2);
    expect(config.tables.min_columns).toBe(2);
    expect(config.tables.max_blank_lines).toBe(2);
    expect(config.text.control_char_replacement).toBe(" ");
    expect(config.filter.ciks).toEqual([]);
  });

  it("rejects a replacement containing a line break", () => {
    expect(() => ExtractorConfigSchema.parse({ text: { control_char_replacement: "\n" } })).toThrow();
  });

  it("rejects malformed CIK filters", () => {
    expect(() => ExtractorConfigSchema.parse({ filter: { ciks: ["abc"] } })).toThrow();
  });

  it("rejects unknown form types", () => {
    expect(() => ExtractorConfigSchema.parse({ filter: { form_types: ["8-K"] } })).toThrow();
  });
});

describe("validateConfig", () => {
  it("returns success for valid config", () => {
    const result = validateConfig({ tables: { pattern_set: "basic" } });
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
  });

  it("returns dotted paths for errors", () => {
    const result = validateConfig({ tables: { min_rows: 0 } });
    expect(result.success).toBe(false);
    expect(result.errors[0]).toMatch(/^tables\.min_rows: /);
  });
});

describe("validateConfigOrThrow", () => {
  it("throws on invalid config", () => {
    expect(() => validateConfigOrThrow({ extraction: { concurrency: -1 } })).toThrow();
  });
});

describe("defaultConfig", () => {
  it("matches an empty parse", () => {
    expect(defaultConfig()).toEqual(ExtractorConfigSchema.parse({}));
  });
});

describe("validateAtStartup", () => {
  it("has no warnings for defaults", () => {
    const result = validateAtStartup({});
    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it("warns when min_rows can never be reached", () => {
    const result = validateAtStartup({ tables: { min_rows: 60, max_region_lines: 50 } });
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toContain("tables.min_rows (60)");
  });

  it("warns when control characters are kept", () => {
    const result = validateAtStartup({ text: { control_chars: "keep" } });
    expect(result.warnings).toEqual([
      "text.control_chars is 'keep'; control characters will be copied into output files",
    ]);
  });

  it("returns errors without warnings when schema validation fails", () => {
    const result = validateAtStartup({ sections: { max_words: 0 } });
    expect(result.success).toBe(false);
    expect(result.warnings).toEqual([]);
  });
});
