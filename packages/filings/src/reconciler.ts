/**
 * Dual-View Reconciler
 *
 * Section bounds are found as character offsets in the parsing view, but
 * output is cut from the preservation view. The two views share line
 * numbers and nothing else, so offsets are converted to lines here and the
 * preservation lines are sliced by number.
 */

export interface LineRange {
	/** 0-based, inclusive */
	startLine: number;
	/** 0-based, inclusive */
	endLine: number;
}

/**
 * Map character offsets in `text` to the lines containing them.
 *
 * Each line spans `[lineStart, lineStart + length]`, the upper bound being
 * its newline. Offsets are clamped to the text; an end offset that no line
 * contains falls back to the last line. The end line is never before the
 * start line.
 */
export function offsetsToLines(text: string, startOffset: number, endOffset?: number): LineRange {
	const lines = text.split("\n");
	const lastLine = lines.length - 1;
	const start = clamp(startOffset, 0, text.length);
	const end = endOffset === undefined ? undefined : clamp(endOffset, 0, text.length);

	let startLine: number | undefined;
	let endLine: number | undefined;
	let lineStart = 0;

	for (let index = 0; index < lines.length; index++) {
		const lineEnd = lineStart + (lines[index] ?? "").length;
		if (startLine === undefined && start >= lineStart && start <= lineEnd) {
			startLine = index;
		}
		if (end !== undefined && endLine === undefined && end >= lineStart && end <= lineEnd) {
			endLine = index;
		}
		if (startLine !== undefined && (end === undefined || endLine !== undefined)) {
			break;
		}
		lineStart = lineEnd + 1;
	}

	const resolvedStart = startLine ?? lastLine;
	return {
		startLine: resolvedStart,
		endLine: Math.max(resolvedStart, endLine ?? lastLine),
	};
}

/**
 * Inclusive slice of `lines`, clamped to the available lines
 */
export function sliceLines(lines: readonly string[], range: LineRange): string[] {
	const start = clamp(range.startLine, 0, lines.length);
	const end = clamp(range.endLine, -1, lines.length - 1);
	return lines.slice(start, end + 1);
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(Math.max(value, min), max);
}
