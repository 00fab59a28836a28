/**
 * Line Classifier
 *
 * Assigns each line one of the LineClassification tags. Rules are checked
 * in precedence order and the first match wins. Numeric density ranks
 * above keyword headers; a lone two-column number row is only tabular when
 * its neighborhood is.
 *
 * @example
 * ```typescript
 * const classifier = new LineClassifier(createPatternLibrary("extended"));
 * classifier.classifyAll(["Revenue", "----", "$100   $200"]);
 * // ["regular_text", "table_delimiter", "monetary_data"]
 * ```
 */

import type { PatternLibrary } from "../patterns/library.js";
import type { LineClassification, LineWindow } from "../types.js";
import { LineFeatures } from "./line-features.js";

/** Neighbors considered on each side of a line */
export const CONTEXT_RADIUS = 3;

/** Neighbors that must show table evidence for rule 7 */
const MIN_CONTEXT_EVIDENCE = 2;

export class LineClassifier {
	readonly features: LineFeatures;

	constructor(readonly patterns: PatternLibrary) {
		this.features = new LineFeatures(patterns.tables);
	}

	/**
	 * Classify one line given its neighbors. Pure: depends only on the
	 * arguments.
	 */
	classifyWindow(line: string, window: LineWindow): LineClassification {
		const f = this.features;

		if (f.isBlank(line)) {
			return "empty";
		}
		if (f.isDelimiter(line)) {
			return "table_delimiter";
		}
		if (f.hasMonetary(line) && f.hasColumnarEvidence(line)) {
			return "monetary_data";
		}
		if (f.isTableHeader(line)) {
			return "table_header";
		}
		if (f.pipeCount(line) >= 2) {
			return "table_content";
		}
		if (f.monetaryCount(line) >= 2 || f.percentageCount(line) >= 2) {
			return "monetary_data";
		}
		if (f.hasNumericColumns(line) && this.hasTableContext(window)) {
			return "table_content";
		}
		if (f.hasColumnSpacing(line) && f.hasFinancialKeyword(line)) {
			return "potential_table";
		}
		if (f.isContinuation(line)) {
			return "table_continuation";
		}
		return "regular_text";
	}

	/**
	 * Classify `lines[index]` using up to three neighbors on each side
	 */
	classify(lines: readonly string[], index: number): LineClassification {
		return this.classifyWindow(lines[index] ?? "", windowAt(lines, index));
	}

	classifyAll(lines: readonly string[]): LineClassification[] {
		return lines.map((_, index) => this.classify(lines, index));
	}

	private hasTableContext(window: LineWindow): boolean {
		let evidence = 0;
		for (const neighbor of [...window.before, ...window.after]) {
			if (this.showsTableEvidence(neighbor)) {
				evidence++;
				if (evidence >= MIN_CONTEXT_EVIDENCE) {
					return true;
				}
			}
		}
		return false;
	}

	private showsTableEvidence(line: string): boolean {
		const f = this.features;
		return f.hasMonetary(line) || f.hasPercentage(line) || f.hasColumnSpacing(line) || f.isTableHeader(line);
	}
}

/**
 * The ±3 neighbor window around `index`, excluding the line itself
 */
export function windowAt(lines: readonly string[], index: number): LineWindow {
	return {
		before: lines.slice(Math.max(0, index - CONTEXT_RADIUS), Math.max(0, index)),
		after: lines.slice(index + 1, index + 1 + CONTEXT_RADIUS),
	};
}
