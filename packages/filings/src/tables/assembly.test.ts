/**
 * Table-Fencing Assembly Tests
 */

import { describe, expect, test } from "vitest";
import { createPatternLibrary } from "../patterns/library.js";
import { TABLE_FENCE_END, TABLE_FENCE_START, TableFencer, collapseWhitespace } from "./assembly.js";
import { LineClassifier } from "./classifier.js";
import { TableDetector } from "./detector.js";

const classifier = new LineClassifier(createPatternLibrary("extended"));
const fencer = new TableFencer(classifier, new TableDetector(classifier));

describe("TableFencer", () => {
	test("fences tables, collapses prose and keeps data lines verbatim", () => {
		const lines = [
			"Results of Operations",
			"",
			"  The   company   grew.",
			"",
			"Revenue",
			"----",
			"$100   $200",
			"$110   $210",
			"",
			"Prices were stable this year.",
			"",
			"Net sales    $1,200",
		];

		const { text, tables } = fencer.assemble(lines);

		expect(text).toBe(
			[
				"Results of Operations",
				"",
				"  The company grew.",
				"",
				TABLE_FENCE_START,
				"Revenue",
				"----",
				"$100   $200",
				"$110   $210",
				TABLE_FENCE_END,
				"",
				"Prices were stable this year.",
				"",
				"Net sales    $1,200",
			].join("\n"),
		);
		expect(tables.map((table) => [table.startLine, table.endLine])).toEqual([[4, 7]]);
	});

	test("collapses an indented paragraph that follows a table", () => {
		const { text, tables } = fencer.assemble([
			"Revenue",
			"----",
			"$100   $200",
			"$110   $210",
			"",
			"    The   increase in revenue was driven by higher volume in all segments",
			"during the year, partially offset by pricing.",
		]);

		expect(tables.map((table) => [table.startLine, table.endLine])).toEqual([[0, 3]]);
		expect(text).toBe(
			[
				TABLE_FENCE_START,
				"Revenue",
				"----",
				"$100   $200",
				"$110   $210",
				TABLE_FENCE_END,
				"",
				"    The increase in revenue was driven by higher volume in all segments",
				"during the year, partially offset by pricing.",
			].join("\n"),
		);
	});

	test("squeezes blank runs and drops leading and trailing blanks", () => {
		const { text } = fencer.assemble(["", "", "First.", "", "", "", "Second.", ""]);

		expect(text).toBe("First.\n\nSecond.");
	});

	test("collapses a sentence that only looks like a continuation row", () => {
		const { text } = fencer.assemble(["Total revenue rose in every region.   "]);

		expect(text).toBe("Total revenue rose in every region.");
	});

	test("returns empty text for no lines", () => {
		expect(fencer.assemble([])).toEqual({ text: "", tables: [] });
	});
});

describe("collapseWhitespace", () => {
	test("keeps at most four characters of indentation", () => {
		expect(collapseWhitespace("        eight")).toBe("    eight");
		expect(collapseWhitespace("\t\t  Deep   indent")).toBe("\t\t  Deep indent");
	});

	test("reduces inner runs to one space", () => {
		expect(collapseWhitespace("The \t company   grew. ")).toBe("The company grew.");
	});
});
