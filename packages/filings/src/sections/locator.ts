/**
 * Section Boundary Locator
 *
 * Finds the MD&A section in a parsing view. Table-of-contents entries
 * match the same headings as the real section, so every start marker is
 * tried and the candidate with the longest body wins.
 *
 * @example
 * ```typescript
 * const locator = new SectionLocator(createPatternLibrary("extended"));
 * const location = locator.locate(parsing.text, "10-K");
 * if (location.kind === "incorporated") {
 *   console.log(location.reference.documentType); // "Exhibit 13"
 * }
 * ```
 */

import { INCORPORATION_TARGETS, PAGE_RANGE } from "../patterns/sections.js";
import { type PatternLibrary, toGlobal } from "../patterns/library.js";
import type { FormType, IncorporationReference, SectionBounds, SectionLocation } from "../types.js";
import { countWords } from "./words.js";

// ============================================
// Options
// ============================================

export interface LocatorOptions {
	/**
	 * A located section at most this long that mentions incorporation by
	 * reference is treated as a reference
	 */
	incorporationMaxWords: number;
}

const DEFAULT_LOCATOR_OPTIONS: LocatorOptions = {
	incorporationMaxWords: 250,
};

/** Characters searched around an MD&A mention when no section is found */
const MENTION_WINDOW = 1_000;

/** Most characters kept from a reference sentence */
const MAX_LOCATOR_LENGTH = 500;

export function isQuarterly(formType: FormType): boolean {
	return formType.startsWith("10-Q");
}

// ============================================
// Locator
// ============================================

export class SectionLocator {
	private readonly options: LocatorOptions;

	constructor(
		private readonly patterns: PatternLibrary,
		options: Partial<LocatorOptions> = {},
	) {
		this.options = { ...DEFAULT_LOCATOR_OPTIONS, ...options };
	}

	/**
	 * Bounds of the MD&A section, `end` exclusive
	 *
	 * Amendments use the markers of their base form.
	 */
	findMdna(text: string, formType: FormType): SectionBounds | undefined {
		const quarterly = isQuarterly(formType);
		const starts = quarterly ? this.patterns.sections.start10Q : this.patterns.sections.start10K;
		const ends = quarterly ? this.patterns.sections.end10Q : this.patterns.sections.end10K;

		let best: SectionBounds | undefined;

		for (const pattern of starts) {
			for (const match of text.matchAll(toGlobal(pattern))) {
				const start = match.index ?? 0;
				const end = this.nextMarker(text, start + match[0].length, ends) ?? text.length;
				const isLonger = best === undefined || end - start > best.end - best.start;
				const isEarlierTie = best !== undefined && end - start === best.end - best.start && start < best.start;
				if (isLonger || isEarlierTie) {
					best = { start, end, heading: match[0].replace(/\s+/g, " ").trim() };
				}
			}
		}

		return best;
	}

	/**
	 * Look for incorporation-by-reference language in `text[start, end)`
	 */
	checkIncorporationByReference(text: string, start = 0, end = text.length): IncorporationReference | undefined {
		const body = text.slice(start, end);

		let earliest: RegExpExecArray | undefined;
		for (const phrase of this.patterns.sections.incorporation) {
			const match = phrase.exec(body);
			if (match && (earliest === undefined || match.index < earliest.index)) {
				earliest = match;
			}
		}
		if (!earliest) {
			return undefined;
		}

		const sentence = sentenceAround(body, earliest.index, earliest.index + earliest[0].length);
		const pages = PAGE_RANGE.exec(sentence);

		return {
			documentType: documentTypeOf(sentence) ?? documentTypeOf(body) ?? "Referenced Document",
			locator: sentence.slice(0, MAX_LOCATOR_LENGTH),
			pages: pages ? [pages[1], pages[2]].filter((page) => page !== undefined).join(" through ") : undefined,
			matchedText: earliest[0],
			position: start + earliest.index,
		};
	}

	/**
	 * Where the MD&A content is: inline, in another document, or nowhere
	 */
	locate(text: string, formType: FormType): SectionLocation {
		const bounds = this.findMdna(text, formType);

		if (bounds) {
			const words = countWords(text.slice(bounds.start, bounds.end));
			if (words <= this.options.incorporationMaxWords) {
				const reference = this.checkIncorporationByReference(text, bounds.start, bounds.end);
				if (reference) {
					return { kind: "incorporated", reference, bounds };
				}
			}
			return { kind: "section", bounds };
		}

		for (const mention of text.matchAll(toGlobal(this.patterns.sections.mention))) {
			const at = mention.index ?? 0;
			const reference = this.checkIncorporationByReference(
				text,
				Math.max(0, at - MENTION_WINDOW),
				Math.min(text.length, at + MENTION_WINDOW),
			);
			if (reference) {
				return { kind: "incorporated", reference };
			}
		}

		return { kind: "missing" };
	}

	private nextMarker(text: string, from: number, markers: readonly RegExp[]): number | undefined {
		let earliest: number | undefined;
		for (const marker of markers) {
			const global = toGlobal(marker);
			global.lastIndex = from;
			const match = global.exec(text);
			if (match && (earliest === undefined || match.index < earliest)) {
				earliest = match.index;
			}
		}
		return earliest;
	}
}

// ============================================
// Helpers
// ============================================

function documentTypeOf(text: string): string | undefined {
	for (const target of INCORPORATION_TARGETS) {
		const match = target.pattern.exec(text);
		if (match) {
			return target.documentType(match);
		}
	}
	return undefined;
}

/**
 * The sentence containing `text[from, to)`, whitespace collapsed
 */
function sentenceAround(text: string, from: number, to: number): string {
	let start = 0;
	for (const boundary of text.slice(0, from).matchAll(/[.!?]\s+|\n[ \t]*\n\s*/g)) {
		start = (boundary.index ?? 0) + boundary[0].length;
	}
	// Skip an all-caps heading line directly above the sentence
	const head = text.slice(start, from);
	const lastBreak = head.lastIndexOf("\n");
	if (lastBreak >= 0 && !/[a-z]/.test(head.slice(0, lastBreak))) {
		start += lastBreak + 1;
	}
	const after = /[.!?](?=\s|$)/.exec(text.slice(to));
	const end = after ? to + after.index + 1 : text.length;
	return text.slice(start, end).replace(/\s+/g, " ").trim();
}
