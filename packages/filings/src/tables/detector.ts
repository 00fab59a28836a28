/**
 * Table Region Detector
 *
 * Four independent strategies propose table regions over a line sequence;
 * overlapping proposals are then resolved by the deduplicator.
 *
 * | Strategy  | Trigger                               | Confidence | Type             |
 * |-----------|---------------------------------------|------------|------------------|
 * | financial | financial-statement header            | 0.95       | financial        |
 * | delimited | horizontal rule followed by data      | 0.90       | delimited        |
 * | pipe      | two or more `|` characters            | 0.90-0.95  | delimited        |
 * | monetary  | two amounts or two percentages        | 0.95       | aligned / mixed  |
 *
 * Each strategy keeps its own set of consumed lines, so a line claimed by
 * one strategy can still anchor another.
 */

import type { TableSettings } from "@mdna/config";
import type { DetectionStrategy, Table, TableType } from "../types.js";
import type { LineClassifier } from "./classifier.js";
import { dedupe } from "./dedupe.js";
import type { LineFeatures } from "./line-features.js";

// ============================================
// Options
// ============================================

export interface DetectorOptions {
	/** Minimum non-blank lines in a region */
	minRows: number;
	/** Minimum cells in the widest row */
	minColumns: number;
	/** Hard stop for region growth */
	maxRegionLines: number;
	/** Consecutive blank lines tolerated inside a region */
	maxBlankLines: number;
	/** Move the region start up to the detected title */
	titleInRegion: boolean;
}

export const DEFAULT_DETECTOR_OPTIONS: DetectorOptions = {
	minRows: 2,
	minColumns: 2,
	maxRegionLines: 50,
	maxBlankLines: 2,
	titleInRegion: false,
};

export function detectorOptions(settings: TableSettings): DetectorOptions {
	return {
		minRows: settings.min_rows,
		minColumns: settings.min_columns,
		maxRegionLines: settings.max_region_lines,
		maxBlankLines: settings.max_blank_lines,
		titleInRegion: settings.title_in_region,
	};
}

/** Non-blank lines searched above a region for its title */
const TITLE_LOOKBACK = 5;
const MAX_TITLE_LENGTH = 200;

const BARE_NUMBER = /^[\d\s,.$()%-]+$/;

interface Candidate {
	start: number;
	end: number;
	strategy: DetectionStrategy;
	tableType: TableType;
	confidence: number;
}

// ============================================
// Detector
// ============================================

export class TableDetector {
	private readonly features: LineFeatures;
	private readonly options: DetectorOptions;

	constructor(classifier: LineClassifier, options: Partial<DetectorOptions> = {}) {
		this.features = classifier.features;
		this.options = { ...DEFAULT_DETECTOR_OPTIONS, ...options };
	}

	/**
	 * Detect table regions, deduplicated and sorted by start line
	 */
	detect(lines: readonly string[]): Table[] {
		return dedupe(this.detectCandidates(lines));
	}

	/**
	 * Every strategy's accepted regions, before deduplication
	 */
	detectCandidates(lines: readonly string[]): Table[] {
		return [
			...this.detectFinancial(lines),
			...this.detectDelimited(lines),
			...this.detectPipe(lines),
			...this.detectMonetary(lines),
		];
	}

	// ============================================
	// Strategies
	// ============================================

	detectFinancial(lines: readonly string[]): Table[] {
		return this.scan(lines, (index) => {
			if (!this.features.isFinancialStatementHeader(lines[index] ?? "")) {
				return undefined;
			}
			return {
				start: index,
				end: this.grow(lines, index),
				strategy: "financial",
				tableType: "financial",
				confidence: 0.95,
			};
		});
	}

	detectDelimited(lines: readonly string[]): Table[] {
		return this.scan(lines, (index, consumed) => {
			const next = lines[index + 1];
			if (!this.features.isDelimiter(lines[index] ?? "") || next === undefined || !this.isRowLike(next)) {
				return undefined;
			}
			const above = lines[index - 1];
			const hasHeader = above !== undefined && !this.features.isBlank(above) && !consumed.has(index - 1);
			return {
				start: hasHeader ? index - 1 : index,
				end: this.grow(lines, index),
				strategy: "delimited",
				tableType: "delimited",
				confidence: 0.9,
			};
		});
	}

	detectPipe(lines: readonly string[]): Table[] {
		return this.scan(lines, (index) => {
			if (this.features.pipeCount(lines[index] ?? "") < 2) {
				return undefined;
			}
			let end = index;
			for (let j = index + 1; j < lines.length; j++) {
				const line = lines[j] ?? "";
				const continues =
					this.features.pipeCount(line) >= 2 || (!this.features.isBlank(line) && this.features.isContinuation(line));
				if (!continues) {
					break;
				}
				end = j;
			}
			const hasSeparator = lines.slice(index, end + 1).some((line) => this.features.isPipeSeparator(line));
			return {
				start: index,
				end,
				strategy: "pipe",
				tableType: "delimited",
				confidence: hasSeparator ? 0.95 : 0.9,
			};
		});
	}

	detectMonetary(lines: readonly string[]): Table[] {
		return this.scan(lines, (index) => {
			const line = lines[index] ?? "";
			if (this.features.monetaryCount(line) < 2 && this.features.percentageCount(line) < 2) {
				return undefined;
			}
			const end = this.grow(lines, index);
			const dataRows = lines
				.slice(index, end + 1)
				.filter((row) => !this.features.isBlank(row) && !this.features.isDelimiter(row));
			const aligned = dataRows.every((row) => this.features.hasColumnSegments(row));
			return {
				start: index,
				end,
				strategy: "monetary",
				tableType: aligned ? "aligned" : "mixed",
				confidence: 0.95,
			};
		});
	}

	// ============================================
	// Region Growth
	// ============================================

	/**
	 * Last line of a region anchored at `anchor`. Absorbs table-like lines,
	 * tolerates short blank runs and stops at a section break or the
	 * region length limit. Trailing blanks are never included.
	 */
	private grow(lines: readonly string[], anchor: number): number {
		let end = anchor;
		let blankRun = 0;

		for (let j = anchor + 1; j < lines.length; j++) {
			if (j - anchor >= this.options.maxRegionLines) {
				break;
			}
			const line = lines[j] ?? "";
			if (this.features.isBlank(line)) {
				blankRun++;
				if (blankRun > this.options.maxBlankLines) {
					break;
				}
				continue;
			}
			if (this.features.isSectionBreak(line) || !this.isAbsorbable(line)) {
				break;
			}
			blankRun = 0;
			end = j;
		}

		return end;
	}

	/** Rows with column structure, or table-ish lines that do not read as sentences */
	private isAbsorbable(line: string): boolean {
		const f = this.features;
		if (f.isDelimiter(line) || f.hasColumnSpacing(line) || f.pipeCount(line) >= 2) {
			return true;
		}
		if (f.isSentenceLike(line)) {
			return false;
		}
		return f.isDataLine(line) || f.isContinuation(line) || f.isTableHeader(line);
	}

	private isRowLike(line: string): boolean {
		return !this.features.isBlank(line) && (this.features.isDataLine(line) || this.features.isContinuation(line));
	}

	// ============================================
	// Acceptance
	// ============================================

	/**
	 * Walk the lines, letting `propose` suggest a region at each unconsumed
	 * anchor. Accepted regions consume their lines; a rejected anchor is
	 * left for the next line.
	 */
	private scan(
		lines: readonly string[],
		propose: (index: number, consumed: ReadonlySet<number>) => Candidate | undefined,
	): Table[] {
		const consumed = new Set<number>();
		const tables: Table[] = [];

		for (let index = 0; index < lines.length; index++) {
			if (consumed.has(index)) {
				continue;
			}
			const candidate = propose(index, consumed);
			const table = candidate ? this.accept(lines, candidate) : undefined;
			if (!table) {
				continue;
			}
			tables.push(table);
			for (let line = table.startLine; line <= table.endLine; line++) {
				consumed.add(line);
			}
			index = Math.max(index, table.endLine);
		}

		return tables;
	}

	private accept(lines: readonly string[], candidate: Candidate): Table | undefined {
		const region = lines.slice(candidate.start, candidate.end + 1);
		const nonBlank = region.filter((line) => !this.features.isBlank(line));
		const rows = nonBlank
			.filter((line) => !this.features.isDelimiter(line) && !this.features.isPipeSeparator(line))
			.map((line) => this.features.splitCells(line));
		const columnCount = rows.reduce((widest, row) => Math.max(widest, row.length), 0);

		if (
			nonBlank.length < this.options.minRows ||
			columnCount < this.options.minColumns ||
			!region.some((line) => this.features.hasDigit(line))
		) {
			return undefined;
		}

		const title = this.findTitle(lines, candidate.start);
		const startLine = this.options.titleInRegion && title ? title.line : candidate.start;
		const text = lines.slice(startLine, candidate.end + 1);

		return {
			startLine,
			endLine: candidate.end,
			title: title?.text,
			tableType: candidate.tableType,
			strategy: candidate.strategy,
			confidence: candidate.confidence,
			originalText: text.join("\n"),
			rows,
			rowCount: nonBlank.length,
			columnCount,
			hasMonetaryData: region.some((line) => this.features.hasMonetary(line)),
			hasPercentageData: region.some((line) => this.features.hasPercentage(line)),
		};
	}

	/**
	 * Nearest short, non-tabular line above the region that reads like a
	 * title
	 */
	findTitle(lines: readonly string[], start: number): { text: string; line: number } | undefined {
		let examined = 0;
		for (let k = start - 1; k >= 0 && examined < TITLE_LOOKBACK; k--) {
			const text = (lines[k] ?? "").trim();
			if (text.length === 0) {
				continue;
			}
			examined++;
			if (text.length >= MAX_TITLE_LENGTH || BARE_NUMBER.test(text) || this.isTableLike(text)) {
				continue;
			}
			if (this.features.isSectionBreak(text)) {
				continue;
			}
			if (this.features.isTitleShaped(text)) {
				return { text, line: k };
			}
		}
		return undefined;
	}

	private isTableLike(line: string): boolean {
		const f = this.features;
		return f.isDelimiter(line) || f.pipeCount(line) >= 2 || f.hasColumnSegments(line) || f.monetaryCount(line) > 0;
	}
}
