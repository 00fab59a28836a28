/**
 * Table-Fencing Assembly
 *
 * Re-walks the sliced preservation lines. Regions found by the table
 * detector are copied verbatim between fences; prose is whitespace
 * collapsed; every other line is emitted byte for byte.
 *
 * @example
 * ```typescript
 * const fencer = new TableFencer(classifier, detector);
 * const { text, tables } = fencer.assemble(preservation.lines.slice(10, 200));
 * ```
 */

import type { LineClassification, Table } from "../types.js";
import type { LineClassifier } from "./classifier.js";
import type { TableDetector } from "./detector.js";

export const TABLE_FENCE_START = "--- BEGIN TABLE ---";
export const TABLE_FENCE_END = "--- END TABLE ---";

export interface AssembledSection {
	text: string;
	/** Regions fenced in `text`, line numbers relative to the input lines */
	tables: Table[];
}

const MAX_KEPT_INDENT = /^\s{0,4}/;

export class TableFencer {
	constructor(
		private readonly classifier: LineClassifier,
		private readonly detector: TableDetector,
	) {}

	assemble(lines: readonly string[]): AssembledSection {
		const tables = this.detector.detect(lines);
		const classifications = this.classifier.classifyAll(lines);
		const output: string[] = [];

		const blank = (): void => {
			if (output.length > 0 && output[output.length - 1] !== "") {
				output.push("");
			}
		};

		let next = 0;
		for (let index = 0; index < lines.length; index++) {
			const table = tables[next];
			if (table && table.startLine === index) {
				blank();
				output.push(TABLE_FENCE_START, ...lines.slice(table.startLine, table.endLine + 1), TABLE_FENCE_END);
				blank();
				index = table.endLine;
				next++;
				continue;
			}

			const line = lines[index] ?? "";
			if (line.trim().length === 0) {
				blank();
			} else if (this.isProse(line, classifications[index] ?? "regular_text")) {
				output.push(collapseWhitespace(line));
			} else {
				output.push(line);
			}
		}

		while (output[output.length - 1] === "") {
			output.pop();
		}

		return { text: output.join("\n"), tables };
	}

	private isProse(line: string, classification: LineClassification): boolean {
		if (classification === "regular_text") {
			return true;
		}
		return (
			(classification === "table_continuation" || classification === "table_header") &&
			this.classifier.features.isSentenceLike(line)
		);
	}
}

/**
 * Keep up to four characters of indentation and reduce every other
 * whitespace run to one space
 */
export function collapseWhitespace(line: string): string {
	const indent = MAX_KEPT_INDENT.exec(line)?.[0] ?? "";
	return indent + line.slice(indent.length).trim().replace(/\s+/g, " ");
}
