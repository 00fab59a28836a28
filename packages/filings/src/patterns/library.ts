/**
 * Pattern Library
 *
 * The compiled regular expressions every engine component matches against,
 * grouped by purpose. A library is built once from a named set and handed
 * to the classifier, detector and section locator at construction time.
 *
 * @example
 * ```typescript
 * const patterns = createPatternLibrary("extended");
 * const classifier = new LineClassifier(patterns);
 * ```
 */

import type { PatternSetName } from "@mdna/config";
import { BASIC_TABLE_PATTERNS } from "./basic.js";
import { EXTENDED_TABLE_PATTERNS } from "./extended.js";
import {
	INCORPORATION_PHRASES,
	MDNA_END_10K,
	MDNA_END_10Q,
	MDNA_MENTION,
	MDNA_START_10K,
	MDNA_START_10K_ABBREVIATED,
	MDNA_START_10Q,
	MDNA_START_10Q_ABBREVIATED,
	MDNA_STANDALONE,
} from "./sections.js";

// ============================================
// Types
// ============================================

export interface SectionPatterns {
	readonly start10K: readonly RegExp[];
	readonly start10Q: readonly RegExp[];
	readonly end10K: readonly RegExp[];
	readonly end10Q: readonly RegExp[];
	readonly standalone: RegExp;
	/** Unanchored MD&A mention, used to probe for incorporation language */
	readonly mention: RegExp;
	readonly incorporation: readonly RegExp[];
}

export interface TablePatterns {
	/** `$` followed by digit groups, optionally parenthesized */
	readonly monetary: RegExp;
	readonly percentage: RegExp;
	/** Two numeric values separated by whitespace */
	readonly numericColumns: RegExp;
	/** Run of four or more spaces */
	readonly wideSpacing: RegExp;
	/** Gap between columns when splitting cells */
	readonly columnGap: RegExp;
	/** Horizontal rule, tested against the whole line */
	readonly delimiterLine: RegExp;
	/** Markdown-style `|---|---|` separator row */
	readonly pipeSeparator: RegExp;
	/** Two years or two dates separated by a column gap */
	readonly multiPeriod: readonly RegExp[];
	readonly tableHeaders: readonly RegExp[];
	readonly financialStatementHeaders: readonly RegExp[];
	/** Column-header terms, a header only with column spacing */
	readonly headerKeywords: RegExp;
	readonly financialKeywords: RegExp;
	readonly continuation: readonly RegExp[];
	readonly sectionBreaks: readonly RegExp[];
	readonly titleKeywords: RegExp;
	readonly capitalizedPhrase: RegExp;
	/** `Label   1,234` rows the cell splitter falls back to */
	readonly labelValue: RegExp;
}

export interface PatternLibrary {
	readonly name: PatternSetName;
	readonly sections: SectionPatterns;
	readonly tables: TablePatterns;
}

// ============================================
// Construction
// ============================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const key of Object.keys(value)) {
		const child: unknown = Reflect.get(value, key);
		if (typeof child === "object" && child !== null && !(child instanceof RegExp) && !Object.isFrozen(child)) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}

/**
 * Build a frozen pattern library for the named set.
 *
 * - basic: broad keyword matching, higher recall
 * - extended: anchored statement line items and abbreviated section
 *   headings, higher precision
 */
export function createPatternLibrary(name: PatternSetName = "extended"): PatternLibrary {
	const extended = name === "extended";

	const sections: SectionPatterns = {
		start10K: extended ? [...MDNA_START_10K, ...MDNA_START_10K_ABBREVIATED] : [...MDNA_START_10K],
		start10Q: extended ? [...MDNA_START_10Q, ...MDNA_START_10Q_ABBREVIATED] : [...MDNA_START_10Q],
		end10K: [...MDNA_END_10K],
		end10Q: [...MDNA_END_10Q],
		standalone: MDNA_STANDALONE,
		mention: MDNA_MENTION,
		incorporation: [...INCORPORATION_PHRASES],
	};

	const tables: TablePatterns = extended ? { ...EXTENDED_TABLE_PATTERNS } : { ...BASIC_TABLE_PATTERNS };

	return deepFreeze({ name, sections, tables });
}

// ============================================
// Helpers
// ============================================

/**
 * Count non-overlapping matches of a pattern.
 *
 * Matches run on a private global copy, so a library pattern's `lastIndex`
 * is never touched.
 */
export function countMatches(text: string, pattern: RegExp): number {
	const global = toGlobal(pattern);
	let count = 0;
	let match = global.exec(text);
	while (match !== null) {
		count++;
		if (match[0].length === 0) {
			global.lastIndex++;
		}
		match = global.exec(text);
	}
	return count;
}

/**
 * A fresh global copy of a pattern, for `matchAll` and `exec` loops
 */
export function toGlobal(pattern: RegExp): RegExp {
	return new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
}

/**
 * Whether any pattern in the group matches
 */
export function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
	return patterns.some((pattern) => pattern.test(text));
}
