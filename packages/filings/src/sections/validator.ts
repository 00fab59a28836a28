/**
 * Section Validator
 *
 * Sanity checks on a located section. Every finding is a warning: the
 * extraction is still written.
 */

import { matchesAny, type PatternLibrary } from "../patterns/library.js";
import type { FormType, SectionValidation } from "../types.js";
import { isQuarterly } from "./locator.js";
import { countWords } from "./words.js";

export interface ValidatorOptions {
	minWords: number;
	maxWords: number;
}

const DEFAULT_VALIDATOR_OPTIONS: ValidatorOptions = {
	minWords: 100,
	maxWords: 60_000,
};

/** Characters at the section start searched for its heading */
const HEADING_WINDOW = 300;

/**
 * Topics nearly every MD&A discusses
 */
export const MDNA_TOPICS: readonly RegExp[] = [
	/\boverview\b/i,
	/\bresults\s+of\s+operations\b/i,
	/\bliquidity\b/i,
	/\bcapital\s+resources\b/i,
	/\bcritical\s+accounting\b/i,
	/\bcash\s+flows?\b/i,
	/\b(?:net\s+)?(?:revenues?|net\s+sales)\b/i,
	/\boutlook\b/i,
	/\boff-balance\s+sheet\b/i,
	/\bcontractual\s+obligations\b/i,
];

export class SectionValidator {
	private readonly options: ValidatorOptions;

	constructor(
		private readonly patterns: PatternLibrary,
		options: Partial<ValidatorOptions> = {},
	) {
		this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
	}

	validateSection(text: string, start: number, end: number, formType: FormType): SectionValidation {
		const section = text.slice(start, end);
		const wordCount = countWords(section);
		const warnings: string[] = [];

		if (wordCount < this.options.minWords) {
			warnings.push(`Section is short: ${wordCount} words (minimum ${this.options.minWords})`);
		}
		if (wordCount > this.options.maxWords) {
			warnings.push(`Section is unusually long: ${wordCount} words (maximum ${this.options.maxWords})`);
		}

		const heading = section.slice(0, HEADING_WINDOW);
		const annualHeading = matchesAny(heading, this.patterns.sections.start10K);
		const quarterlyHeading = matchesAny(heading, this.patterns.sections.start10Q);
		if (isQuarterly(formType) && annualHeading && !quarterlyHeading) {
			warnings.push(`Section heading is an annual report Item 7 but the form type is ${formType}`);
		}
		if (!isQuarterly(formType) && quarterlyHeading && !annualHeading) {
			warnings.push(`Section heading is a quarterly report Item 2 but the form type is ${formType}`);
		}

		if (!matchesAny(section, MDNA_TOPICS)) {
			warnings.push("Section mentions none of the usual MD&A topics");
		}

		return { isValid: warnings.length === 0, wordCount, warnings };
	}
}
