/**
 * Basic Table Patterns
 *
 * Unanchored keyword matching: a line mentioning revenue, assets or a
 * month-day-year date is enough to open a financial region. Higher recall,
 * more prose caught in candidate regions.
 */

import type { TablePatterns } from "./library.js";

const MONTHS = "january|february|march|april|may|june|july|august|september|october|november|december";

/** One numeric cell: optional `$`, optional parentheses, no trailing comma */
const NUMBER = String.raw`\(?\$?\s*\d(?:[\d,]*\d)?(?:\.\d+)?\)?%?`;

export const BASIC_TABLE_PATTERNS: TablePatterns = {
	monetary: /\$\s*\(?\d[\d,]*(?:\.\d+)?\)?/,
	percentage: /\d+(?:\.\d+)?\s?%/,
	numericColumns: new RegExp(`${NUMBER}[ \\t]+${NUMBER}`),
	wideSpacing: / {4,}/,
	columnGap: /\t| {3,}/,
	delimiterLine: /^\s*(?:[-=_]\s*){3,}$/,
	pipeSeparator: /^\s*\|(?:\s*:?[-=]{3,}:?\s*\|)+\s*$/,
	multiPeriod: [
		/\b(?:19|20)\d{2}\b(?:\t| {2,})\s*(?:19|20)\d{2}\b/,
		new RegExp(`(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}(?:\\t| {2,}).*(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}`, "i"),
		/\d{1,2}[\/-]\d{1,2}[\/-]\d{2,4}\s+\d{1,2}[\/-]\d{1,2}[\/-]\d{2,4}/,
	],
	tableHeaders: [
		/\b(?:year|quarter|period|month)s?\s+end(?:ed|ing)?\b/i,
		/\b(?:three|six|nine|twelve)\s+months?\s+ended\b/i,
		/(?:december|march|june|september)\s+\d{1,2},?\s+\d{4}/i,
		/\b(?:balance\s+sheets?|income\s+statements?|statements?\s+of\s+(?:operations|income|cash\s+flows?))\b/i,
	],
	financialStatementHeaders: [
		/(?:consolidated|condensed)?\s*(?:statements?|schedule)\s+of\b/i,
		/\b(?:year|three|six|nine)\s+months?\s+ended\b/i,
		/(?:december|march|june|september)\s+\d{1,2},?\s+\d{4}/i,
		/\bin\s+(?:millions|thousands|billions)\b/i,
		/\b(?:revenues?|income|assets|liabilities|cash\s+flows?)\b/i,
		/\b(?:balance\s+sheet|income\s+statement|statement\s+of\s+operations)\b/i,
		/\b(?:19|20)\d{2}\b.*\b(?:19|20)\d{2}\b/,
	],
	headerKeywords: /\b(?:revenues?|income|assets|liabilities|equity|cash)\b/i,
	financialKeywords:
		/\b(?:revenues?|income|profit|loss|assets|liabilities|equity|cash|flows?|expenses?|costs?|sales|operating|net|gross|total)\b/i,
	continuation: [
		/\b(?:total|subtotal|net|gross)\b/i,
		/\bless:/i,
		/\bsee\s+note\b/i,
		/^\s*\([a-z0-9]\)/i,
		/^\s*\*/,
	],
	sectionBreaks: [
		/\bnotes\s+to\b/i,
		/\bsee\s+note\b/i,
		/\brefer\s+to\s+note\b/i,
		/\baccompanying\s+notes\b/i,
		/\bsee\s+accompanying\b/i,
		/\bend\s+of\s+table\b/i,
		/\bcontinued\s+on\b/i,
		/\bsee\s+page\b/i,
	],
	titleKeywords: /\b(?:table|statements?|schedules?|summary|consolidated|condensed)\b/i,
	capitalizedPhrase: /^[A-Z][A-Za-z\s]+$/,
	labelValue: /^(.+?)\s+(\$?\s*\(?[\d,]+(?:\.\d+)?\)?.*)$/,
};
