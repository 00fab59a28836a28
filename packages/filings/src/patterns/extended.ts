/**
 * Extended Table Patterns
 *
 * Statement line items and period headers anchored to the start of the
 * line, so prose that merely mentions revenue does not open a region.
 */

import { BASIC_TABLE_PATTERNS } from "./basic.js";
import type { TablePatterns } from "./library.js";

const MONTHS = "january|february|march|april|may|june|july|august|september|october|november|december";

export const EXTENDED_TABLE_PATTERNS: TablePatterns = {
	...BASIC_TABLE_PATTERNS,
	tableHeaders: [
		/^\s*(?:for\s+the\s+)?(?:year|quarter|period|(?:three|six|nine|twelve)\s+months?)s?\s+end(?:ed|ing)\b/i,
		/^\s*(?:fiscal\s+)?(?:year|quarter)\s+\d{4}\b/i,
		new RegExp(`^\\s*(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}\\s*(?:\\t| {2,}|$)`, "i"),
		/^\s*\((?:dollars\s+|amounts\s+)?in\s+(?:thousands|millions|billions)\b/i,
		/^\s*(?:amounts?\s+in\s+|dollars\s+in\s+|\$\s*in\s+)(?:thousands|millions|billions)\b/i,
		/^\s*(?:consolidated\s+)?(?:condensed\s+)?(?:balance\s+sheets?|statements?\s+of\s+|income\s+statements?)/i,
		/^\s*\(?unaudited\)?\s*$/i,
	],
	financialStatementHeaders: [
		/^\s*(?:consolidated\s+)?(?:condensed\s+)?(?:balance\s+sheets?|statements?\s+of\s+|income\s+statements?)/i,
		/^\s*(?:consolidated\s+)?(?:cash\s+flows?|stockholders'?|shareholders'?)\b/i,
		/^\s*(?:current\s+)?assets?\s*:?\s*$/i,
		/^\s*(?:current\s+)?liabilities\s*:?\s*$/i,
		/^\s*(?:stockholder|shareholder)s?'?\s+equity\s*:?\s*$/i,
		/^\s*total\s+(?:assets?|liabilities|equity)\s*$/i,
		/^\s*(?:total\s+)?(?:net\s+)?(?:revenues?|sales)\s*:?\s*$/i,
		/^\s*cost\s+of\s+(?:sales|revenues?|goods\s+sold)\s*:?\s*$/i,
		/^\s*gross\s+(?:profit|margin)\s*:?\s*$/i,
		/^\s*operating\s+(?:income|expenses?)\s*:?\s*$/i,
		/^\s*net\s+(?:income|loss)\s*:?\s*$/i,
		/^\s*(?:net\s+)?cash\s+(?:provided|used)\s+(?:by|in)\s*:?\s*$/i,
		/^\s*(?:operating|investing|financing)\s+activities\s*:?\s*$/i,
	],
	financialKeywords:
		/\b(?:revenues?|income|profit|loss|assets|liabilities|equity|cash|flows?|expenses?|costs?|sales|operating|net|gross|total|current|stockholders?|shareholders?)\b/i,
	continuation: [
		...BASIC_TABLE_PATTERNS.continuation,
		/^\s*(?:add|deduct):/i,
		/^\s*(?:continued|cont\.)/i,
		/\(continued\)/i,
	],
	titleKeywords: /\b(?:table|statement|schedule|summary)\b/i,
};
