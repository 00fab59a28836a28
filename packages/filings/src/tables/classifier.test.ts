/**
 * Line Classifier Tests
 */

import { describe, expect, it, test } from "vitest";
import { createPatternLibrary } from "../patterns/library.js";
import { LineClassifier, windowAt } from "./classifier.js";

const classifier = new LineClassifier(createPatternLibrary("extended"));
const alone = { before: [], after: [] };

describe("LineClassifier", () => {
	describe("rule precedence", () => {
		it("tags blank lines as empty", () => {
			expect(classifier.classifyWindow("", alone)).toBe("empty");
			expect(classifier.classifyWindow(" \t ", alone)).toBe("empty");
		});

		it("tags horizontal rules as delimiters", () => {
			expect(classifier.classifyWindow("=====", alone)).toBe("table_delimiter");
			expect(classifier.classifyWindow("  ---  ===  ", alone)).toBe("table_delimiter");
		});

		it("tags money with column spacing as monetary data", () => {
			expect(classifier.classifyWindow("Total revenue\t$1,200\t$1,100", alone)).toBe("monetary_data");
		});

		it("ranks monetary data above a keyword header", () => {
			expect(classifier.classifyWindow("Revenue      $100      $200", alone)).toBe("monetary_data");
		});

		it("tags period and multi-year headers", () => {
			expect(classifier.classifyWindow("Year Ended December 31,", alone)).toBe("table_header");
			expect(classifier.classifyWindow("                    2023        2022", alone)).toBe("table_header");
		});

		it("tags pipe rows as table content", () => {
			expect(classifier.classifyWindow("| Segment | Revenue |", alone)).toBe("table_content");
		});

		it("tags prose with two amounts as monetary data", () => {
			const line = "Revenue was $5 million compared to $4 million last year.";
			expect(classifier.classifyWindow(line, alone)).toBe("monetary_data");
		});

		it("tags spaced financial keywords as potential tables", () => {
			expect(classifier.classifyWindow("Operating expenses      increased", alone)).toBe("potential_table");
		});

		it("tags totals, notes and footnotes as continuations", () => {
			expect(classifier.classifyWindow("Less: accumulated depreciation", alone)).toBe("table_continuation");
			expect(classifier.classifyWindow("(a) Includes restructuring charges", alone)).toBe("table_continuation");
			expect(classifier.classifyWindow("* Excludes discontinued operations", alone)).toBe("table_continuation");
		});

		it("does not count paragraph indentation as column spacing", () => {
			expect(classifier.classifyWindow("    Revenue increased due to higher volume.", alone)).toBe("regular_text");
			expect(classifier.classifyWindow("        Operating expenses      increased", alone)).toBe("potential_table");
		});

		it("leaves irregularly spaced prose as regular text", () => {
			expect(classifier.classifyWindow("The   company   grew.", alone)).toBe("regular_text");
		});
	});

	describe("table context", () => {
		const lines = ["Segment A      $100", "Segment B      $200", "1,200   1,100", "All other segments grew."];

		it("promotes a numeric row surrounded by table evidence", () => {
			expect(classifier.classify(lines, 2)).toBe("table_content");
		});

		it("leaves the same row as text without neighbors", () => {
			expect(classifier.classifyWindow("1,200   1,100", alone)).toBe("regular_text");
		});

		it("needs two neighbors with evidence", () => {
			const window = { before: ["Segment A      $100"], after: ["All other segments grew."] };
			expect(classifier.classifyWindow("1,200   1,100", window)).toBe("regular_text");
		});
	});

	describe("header and delimiter scenario", () => {
		const lines = ["Revenue", "----", "$100   $200", "$110   $210"];

		test("classifies the rule and the amount rows", () => {
			expect(classifier.classifyAll(lines)).toEqual([
				"regular_text",
				"table_delimiter",
				"monetary_data",
				"monetary_data",
			]);
		});

		test("the basic set agrees", () => {
			const basic = new LineClassifier(createPatternLibrary("basic"));
			expect(basic.classifyAll(lines).slice(1)).toEqual(["table_delimiter", "monetary_data", "monetary_data"]);
		});
	});
});

describe("windowAt", () => {
	const lines = ["a", "b", "c", "d", "e", "f", "g", "h"];

	test("clips at the start", () => {
		expect(windowAt(lines, 0)).toEqual({ before: [], after: ["b", "c", "d"] });
	});

	test("excludes the line itself", () => {
		expect(windowAt(lines, 4)).toEqual({ before: ["b", "c", "d"], after: ["f", "g", "h"] });
	});

	test("clips at the end", () => {
		expect(windowAt(lines, 7)).toEqual({ before: ["e", "f", "g"], after: [] });
	});
});
