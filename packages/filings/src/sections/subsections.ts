/**
 * Subsection Headings
 *
 * Headings inside an extracted section: known MD&A topic names, all-caps
 * lines and short title-case lines that stand on their own. Fenced tables
 * are skipped.
 */

import { TABLE_FENCE_END, TABLE_FENCE_START } from "../tables/assembly.js";
import type { Subsection } from "../types.js";

const MAX_HEADING_LENGTH = 80;
const MAX_TITLE_WORDS = 8;

const TOPIC_HEADING =
	/^(?:[A-Z]\.|\d+\.|\([a-z0-9]\))?\s*(?:executive\s+)?(?:overview|results\s+of\s+operations|liquidity(?:\s+and\s+capital\s+resources)?|capital\s+resources|critical\s+accounting\s+(?:policies|estimates)(?:\s+and\s+estimates)?|cash\s+flows?|outlook|off-balance\s+sheet\s+arrangements|contractual\s+obligations|recent\s+accounting\s+pronouncements|forward-looking\s+statements|segment\s+results|non-gaap\s+financial\s+measures)\b/i;

const ALL_CAPS = /^[A-Z][A-Z0-9&,'()\-/ ]*[A-Z)]$/;

const MINOR_WORDS = new Set(["a", "an", "and", "as", "at", "by", "for", "from", "in", "of", "on", "or", "the", "to", "vs.", "with"]);

function isTitleCase(line: string): boolean {
	const words = line.split(/\s+/);
	if (words.length > MAX_TITLE_WORDS) {
		return false;
	}
	return words.every((word, index) => {
		if (index > 0 && MINOR_WORDS.has(word.toLowerCase())) {
			return true;
		}
		return /^[A-Z0-9("']/.test(word);
	});
}

function isHeadingShaped(line: string): boolean {
	if (line.length > MAX_HEADING_LENGTH || /[.;,]$/.test(line) || /\t| {3,}/.test(line)) {
		return false;
	}
	if (!/[A-Za-z]{2}/.test(line)) {
		return false;
	}
	return TOPIC_HEADING.test(line) || ALL_CAPS.test(line) || isTitleCase(line);
}

/**
 * Headings in `text`, in order. A heading must be preceded by a blank
 * line or the start of the text.
 */
export function extractSubsections(text: string): Subsection[] {
	const subsections: Subsection[] = [];
	const lines = text.split("\n");
	let offset = 0;
	let inTable = false;
	let previousBlank = true;

	for (const [index, raw] of lines.entries()) {
		const line = raw.trim();
		const lineOffset = offset;
		offset += raw.length + 1;

		if (line === TABLE_FENCE_START) {
			inTable = true;
			continue;
		}
		if (line === TABLE_FENCE_END) {
			inTable = false;
			previousBlank = false;
			continue;
		}
		if (inTable) {
			continue;
		}
		if (line.length === 0) {
			previousBlank = true;
			continue;
		}

		if (previousBlank && isHeadingShaped(line)) {
			subsections.push({ title: line.replace(/\s+/g, " "), line: index, offset: lineOffset });
		}
		previousBlank = false;
	}

	return subsections;
}
