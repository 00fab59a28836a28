/**
 * Region Deduplicator Tests
 */

import { describe, expect, test } from "vitest";
import type { Table } from "../types.js";
import { dedupe, overlaps } from "./dedupe.js";

// ============================================
// Test Fixtures
// ============================================

const region = (startLine: number, endLine: number, confidence: number): Table => ({
	startLine,
	endLine,
	tableType: "mixed",
	strategy: "monetary",
	confidence,
	originalText: "",
	rows: [],
	rowCount: endLine - startLine + 1,
	columnCount: 2,
	hasMonetaryData: true,
	hasPercentageData: false,
});

const span = (table: Table) => [table.startLine, table.endLine, table.confidence];

// ============================================
// Tests
// ============================================

describe("overlaps", () => {
	test("uses closed intervals", () => {
		expect(overlaps(region(0, 5, 0.9), region(5, 9, 0.9))).toBe(true);
		expect(overlaps(region(0, 4, 0.9), region(5, 9, 0.9))).toBe(false);
		expect(overlaps(region(3, 4, 0.9), region(0, 9, 0.9))).toBe(true);
	});
});

describe("dedupe", () => {
	test("keeps the higher-confidence region when it starts first", () => {
		const result = dedupe([region(15, 25, 0.9), region(10, 20, 0.95)]);
		expect(result.map(span)).toEqual([[10, 20, 0.95]]);
	});

	test("a later region with strictly higher confidence replaces the earlier one", () => {
		const result = dedupe([region(10, 20, 0.9), region(15, 25, 0.95)]);
		expect(result.map(span)).toEqual([[15, 25, 0.95]]);
	});

	test("equal confidence keeps the region seen first", () => {
		const result = dedupe([region(0, 3, 0.95), region(2, 3, 0.95)]);
		expect(result.map(span)).toEqual([[0, 3, 0.95]]);
	});

	test("a region that beats every overlap replaces all of them", () => {
		const result = dedupe([region(0, 5, 0.9), region(8, 12, 0.9), region(4, 9, 0.95)]);
		expect(result.map(span)).toEqual([[4, 9, 0.95]]);
	});

	test("returns disjoint regions sorted by start line", () => {
		const result = dedupe([region(30, 35, 0.9), region(0, 4, 0.95), region(2, 6, 0.9), region(10, 12, 0.9)]);
		expect(result.map(span)).toEqual([
			[0, 4, 0.95],
			[10, 12, 0.9],
			[30, 35, 0.9],
		]);
	});

	test("does not mutate its input", () => {
		const input = [region(5, 6, 0.9), region(0, 1, 0.9)];
		dedupe(input);
		expect(input.map((table) => table.startLine)).toEqual([5, 0]);
	});
});
