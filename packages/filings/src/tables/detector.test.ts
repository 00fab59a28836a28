/**
 * Table Region Detector Tests
 */

import { describe, expect, it, test } from "vitest";
import { createPatternLibrary } from "../patterns/library.js";
import { LineClassifier } from "./classifier.js";
import { type DetectorOptions, TableDetector } from "./detector.js";

const createDetector = (options: Partial<DetectorOptions> = {}) =>
	new TableDetector(new LineClassifier(createPatternLibrary("extended")), options);

const spans = (tables: { startLine: number; endLine: number }[]) =>
	tables.map((table) => [table.startLine, table.endLine]);

describe("TableDetector", () => {
	describe("header and delimiter scenario", () => {
		const lines = ["Revenue", "----", "$100   $200", "$110   $210"];

		it("yields one region spanning every line", () => {
			const tables = createDetector().detect(lines);

			expect(tables).toHaveLength(1);
			expect(tables[0]).toMatchObject({
				startLine: 0,
				endLine: 3,
				tableType: "financial",
				strategy: "financial",
				confidence: 0.95,
				rowCount: 4,
				columnCount: 2,
				hasMonetaryData: true,
				hasPercentageData: false,
			});
			expect(tables[0]?.originalText).toBe(lines.join("\n"));
		});

		it("finds the same table with three strategies before deduplication", () => {
			const candidates = createDetector().detectCandidates(lines);
			expect(candidates.map((table) => [table.strategy, table.startLine, table.endLine])).toEqual([
				["financial", 0, 3],
				["delimited", 0, 3],
				["monetary", 2, 3],
			]);
		});
	});

	describe("pipe strategy", () => {
		const rows = ["| Retail | 1,200 | 1,100 |", "| Wholesale | 800 | 750 |"];

		it("scores tables with a separator row higher", () => {
			const [table] = createDetector().detect(["| Segment | 2023 | 2022 |", "|---|---|---|", ...rows]);
			expect(table).toMatchObject({ startLine: 0, endLine: 3, strategy: "pipe", tableType: "delimited", confidence: 0.95 });
			expect(table?.rows).toEqual([
				["Segment", "2023", "2022"],
				["Retail", "1,200", "1,100"],
				["Wholesale", "800", "750"],
			]);
			expect(table?.columnCount).toBe(3);
		});

		it("scores tables without a separator row lower", () => {
			const [table] = createDetector().detect(rows);
			expect(table?.confidence).toBe(0.9);
		});
	});

	describe("monetary strategy", () => {
		const lines = ["Segment results", "Retail $1,200 $1,100", "Wholesale $800 $750"];

		it("tags rows without column gaps as mixed and attaches the title", () => {
			const [table] = createDetector().detect(lines);
			expect(table).toMatchObject({
				startLine: 1,
				endLine: 2,
				strategy: "monetary",
				tableType: "mixed",
				title: "Segment results",
			});
			expect(table?.rows[0]).toEqual(["Retail", "$1,200 $1,100"]);
		});

		it("moves the start up to the title when configured", () => {
			const [table] = createDetector({ titleInRegion: true }).detect(lines);
			expect(table?.startLine).toBe(0);
			expect(table?.originalText).toBe(lines.join("\n"));
		});

		it("tags rows with column gaps as aligned", () => {
			const [table] = createDetector().detect(["Retail      $1,200     $1,100", "Wholesale      $800     $750"]);
			expect(table?.tableType).toBe("aligned");
		});
	});

	describe("acceptance", () => {
		it("rejects a single row", () => {
			expect(createDetector().detect(["Total    $1,200    $1,100"])).toEqual([]);
		});

		it("honors a higher minimum row count", () => {
			const lines = ["Retail      $1,200     $1,100", "Wholesale      $800     $750"];
			expect(createDetector().detect(lines)).toHaveLength(1);
			expect(createDetector({ minRows: 3 }).detect(lines)).toEqual([]);
		});

		it("rejects regions without digits", () => {
			expect(createDetector().detect(["Segment   Region", "-----", "North   East", "South   West"])).toEqual([]);
		});
	});

	describe("region growth", () => {
		it("stops at a section-break phrase", () => {
			const tables = createDetector().detect([
				"CONSOLIDATED STATEMENTS OF OPERATIONS",
				"Net sales      $1,200     $1,100",
				"Cost of sales      (700)      (650)",
				"See accompanying notes to consolidated financial statements.",
				"Gross profit      $500     $450",
			]);
			expect(spans(tables)).toEqual([[0, 2]]);
			expect(tables[0]?.tableType).toBe("financial");
		});

		it("tolerates two blank lines inside a region and trims none into it", () => {
			const lines = ["Net sales      $1,200     $1,100", "", "", "Other income      $50     $40", ""];
			expect(spans(createDetector().detect(lines))).toEqual([[0, 3]]);
		});

		it("stops growing at an indented paragraph after the table", () => {
			const lines = [
				"Revenue",
				"----",
				"$100   $200",
				"$110   $210",
				"",
				"    The   increase in revenue was driven by higher volume in all segments",
				"during the year, partially offset by pricing.",
			];
			expect(spans(createDetector().detect(lines))).toEqual([[0, 3]]);
		});

		it("ends a region at the third consecutive blank line", () => {
			const lines = ["Net sales      $1,200     $1,100", "", "", "", "Other income      $50     $40"];
			expect(createDetector().detect(lines)).toEqual([]);
		});

		it("splits long runs at the region length limit", () => {
			const lines = [1, 2, 3, 4, 5].map((n) => `Row ${n}      $${n}00     $${n}10`);
			expect(spans(createDetector({ maxRegionLines: 3 }).detect(lines))).toEqual([
				[0, 2],
				[3, 4],
			]);
		});

		it("does not absorb prose that follows a table", () => {
			const tables = createDetector().detect([
				"Retail      $1,200     $1,100",
				"Wholesale      $800     $750",
				"Sales grew in both segments because of higher volume.",
			]);
			expect(spans(tables)).toEqual([[0, 1]]);
		});
	});

	test("accepted regions never share a line", () => {
		const lines = [
			"CONSOLIDATED BALANCE SHEETS",
			"Cash      $500     $400",
			"Receivables      $300     $250",
			"",
			"Our liquidity remains strong.",
			"",
			"| Segment | 2023 | 2022 |",
			"|---|---|---|",
			"| Retail | 1,200 | 1,100 |",
			"Margin    12.5%    11.0%",
			"Growth    4.0%    3.5%",
		];
		const tables = createDetector().detect(lines);
		const owned = new Set<number>();
		for (const table of tables) {
			for (let line = table.startLine; line <= table.endLine; line++) {
				expect(owned.has(line)).toBe(false);
				owned.add(line);
			}
		}
		expect(tables.length).toBeGreaterThan(1);
	});
});
