/**
 * Section Marker Patterns
 *
 * Headings that open and close the MD&A section, and the phrases that
 * declare it incorporated by reference. Markers are anchored to the start
 * of a line so prose such as "see Item 7" does not open a section.
 */

/** Item 7 heading variants in annual reports */
export const MDNA_START_10K: readonly RegExp[] = [
	/^[ \t]*ITEM\s*7\s*[.:\-]?\s*MANAGEMENT'?S\s+DISCUSSION\s+(?:AND|&)\s+ANALYSIS/im,
	/^[ \t]*ITEM\s*7\s*[.:\-]?\s*MANAGEMENT\s+DISCUSSION\s+(?:AND|&)\s+ANALYSIS/im,
];

/** Abbreviated headings only accepted by the extended set */
export const MDNA_START_10K_ABBREVIATED: readonly RegExp[] = [
	/^[ \t]*ITEM\s*7[\-:.\s]+M\s*D\s*&\s*A\b/im,
	/^[ \t]*ITEM\s*7[\-:.\s]+MDA\b/im,
];

/** Part I, Item 2 heading variants in quarterly reports */
export const MDNA_START_10Q: readonly RegExp[] = [
	/^[ \t]*ITEM\s*2\s*[.:\-]?\s*MANAGEMENT'?S\s+DISCUSSION\s+(?:AND|&)\s+ANALYSIS/im,
	/^[ \t]*ITEM\s*2\s*[.:\-]?\s*MANAGEMENT\s+DISCUSSION\s+(?:AND|&)\s+ANALYSIS/im,
];

export const MDNA_START_10Q_ABBREVIATED: readonly RegExp[] = [/^[ \t]*ITEM\s*2[\-:.\s]+M\s*D\s*&\s*A\b/im];

/** The next top-level heading after Item 7 */
export const MDNA_END_10K: readonly RegExp[] = [
	/^[ \t]*ITEM\s*7A\b/im,
	/^[ \t]*ITEM\s*8\b/im,
	/^[ \t]*ITEM\s*9A?\b/im,
];

/** The next top-level heading after Part I, Item 2 */
export const MDNA_END_10Q: readonly RegExp[] = [
	/^[ \t]*ITEM\s*3\b/im,
	/^[ \t]*ITEM\s*4\b/im,
	/^[ \t]*PART\s+II\b/im,
];

/** MD&A heading without an item number, as printed inside an annual report exhibit */
export const MDNA_STANDALONE: RegExp = /^[ \t]*MANAGEMENT'?S\s+DISCUSSION\s+(?:AND|&)\s+ANALYSIS/im;

export const MDNA_MENTION: RegExp = /management'?s\s+discussion\s+(?:and|&)\s+analysis/i;

export const INCORPORATION_PHRASES: readonly RegExp[] = [
	/incorporated\s+(?:herein\s+|in\s+this\s+item\s+)?by\s+reference/i,
	/(?:is|are)\s+(?:included|contained|set\s+forth)\s+(?:in|under)\b[^.]{0,160}?(?:exhibit\s+13|annual\s+report\s+to\s+(?:share|stock)holders)/i,
];

/** Document the incorporated content lives in, most specific first */
export const INCORPORATION_TARGETS: readonly { pattern: RegExp; documentType: (match: RegExpExecArray) => string }[] = [
	{
		pattern: /exhibit\s+(\d+(?:\.\d+)?)/i,
		documentType: (match) => `Exhibit ${match[1] ?? ""}`.trim(),
	},
	{
		pattern: /annual\s+report\s+to\s+(?:share|stock|security)holders/i,
		documentType: () => "Annual Report to Shareholders",
	},
	{
		pattern: /proxy\s+statement/i,
		documentType: () => "Proxy Statement",
	},
	{
		pattern: /information\s+statement/i,
		documentType: () => "Information Statement",
	},
];

export const PAGE_RANGE: RegExp = /pages?\s+([A-Z]?-?\d+)(?:\s*(?:through|to|and|-)\s*([A-Z]?-?\d+))?/i;
