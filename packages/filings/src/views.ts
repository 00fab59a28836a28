/**
 * Document Views
 *
 * One raw filing yields two views. The parsing view is aggressively
 * cleaned and only ever searched; the preservation view keeps spacing and
 * is what gets written out.
 *
 * Both start from the same structural pass, which is the only step allowed
 * to add or remove line breaks. Everything after it rewrites characters
 * within a line, so line `n` of one view is line `n` of the other. Offsets
 * are not shared between views; line numbers are.
 *
 * @example
 * ```typescript
 * const { parsing, preservation } = createDocumentViews(raw, { controlChars: "replace" });
 * const bounds = locator.findMdna(parsing.text, "10-K");
 * ```
 */

import type { ControlCharPolicy } from "@mdna/config";
import * as cheerio from "cheerio";
import { decodeHTML } from "entities";

// ============================================
// Types
// ============================================

export interface DocumentView {
	readonly text: string;
	readonly lines: readonly string[];
}

export interface DocumentViews {
	readonly parsing: DocumentView;
	readonly preservation: DocumentView;
}

export interface ViewOptions {
	controlChars?: ControlCharPolicy;
	/** Used by the `replace` policy; line breaks are dropped from it */
	replacement?: string;
}

// ============================================
// Patterns
// ============================================

const SGML_HEADER_BLOCKS = /<(SEC-HEADER|IMS-HEADER)>[\s\S]*?<\/\1>/gi;
const SEC_DOCUMENT_OPEN = /<SEC-DOCUMENT>[^\n<]*/gi;
const WRAPPER_FIELDS = /<(?:TYPE|SEQUENCE|FILENAME|DESCRIPTION)>[^\n<]*/gi;
const WRAPPER_TAGS = /<\/?(?:SEC-DOCUMENT|DOCUMENT|TEXT)>/gi;
const HTML_TABLE = /<table\b[\s\S]*?<\/table\s*>/gi;
const HTML_ROW = /<tr\b/i;
// Markup of preformatted SGML tables: column stops, captions, footnotes, page breaks
const SGML_TABLE_TAGS = /<\/?(?:TABLE|CAPTION|S|C|FN|F\d+|PAGE)>/gi;
const HTML_COMMENT = /<!--[\s\S]*?-->/g;
const LINE_BREAK_TAGS = /<br\b[^>]*>|<p\b[^>]*>|<\/(?:p|div|tr|li|h[1-6])\s*>/gi;
const ANY_TAG = /<\/?[A-Za-z][^<>]*>/g;

// C0 and C1 controls other than tab and newline
const CONTROL_CHARS = /[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g;
const NBSP = /[\u00A0\u2007\u202F]/g;

const PAGE_MARKER_LINES = [
	/^[ \t]*table[ \t]+of[ \t]+contents[ \t]*$/gim,
	/^[ \t]*\d{1,3}[ \t]*$/gm,
	/^[ \t]*-[ \t]*\d{1,3}[ \t]*-[ \t]*$/gm,
	/^[ \t]*page[ \t]+\d+(?:[ \t]+of[ \t]+\d+)?[ \t]*$/gim,
];

// UTF-8 punctuation that was decoded as Windows-1252 or Latin-1
const MOJIBAKE_REPAIRS: readonly [RegExp, string][] = [
	[/\u00E2(?:\u20AC\u2122|\u0080\u0099)/g, "\u2019"],
	[/\u00E2(?:\u20AC\u02DC|\u0080\u0098)/g, "\u2018"],
	[/\u00E2(?:\u20AC\u0153|\u0080\u009C)/g, "\u201C"],
	[/\u00E2(?:\u20AC|\u0080)\u009D/g, "\u201D"],
	[/\u00E2(?:\u20AC\u201C|\u0080\u0093)/g, "\u2013"],
	[/\u00E2(?:\u20AC\u201D|\u0080\u0094)/g, "\u2014"],
	[/\u00E2(?:\u20AC|\u0080)\u00A6/g, "\u2026"],
	[/\u00C2(?=\u00A0)/g, ""],
];

const UNICODE_FOLDS: readonly [RegExp, string][] = [
	[/[\u2018\u2019\u201A\u201B\u2032]/g, "'"],
	[/[\u201C\u201D\u201E\u201F\u2033]/g, '"'],
	[/[\u2012\u2013\u2014\u2015\u2212]/g, "-"],
	[/\u2026/g, "..."],
	[/[\u2022\u00B7]/g, "*"],
];

// ============================================
// Structural Pass
// ============================================

/**
 * Render an HTML table as one line per row, cells joined by tabs
 */
export function tableToRows(html: string): string {
	const $ = cheerio.load(html, { xml: false }, false);
	const rows: string[] = [];

	for (const row of $("tr").toArray()) {
		const cells = $(row)
			.find("th, td")
			.toArray()
			.map((cell) => $(cell).text().replace(/\s+/g, " ").trim());
		if (cells.some((cell) => cell.length > 0)) {
			rows.push(cells.join("\t"));
		}
	}

	return rows.join("\n");
}

/**
 * Keep a preformatted SGML table's rows as they are, dropping its markup
 * and the lines that held nothing but markup
 */
export function sgmlTableToText(block: string): string {
	const rows: string[] = [];
	for (const line of block.split("\n")) {
		const stripped = line.replace(SGML_TABLE_TAGS, "");
		if (stripped === line || stripped.trim().length > 0) {
			rows.push(stripped);
		}
	}
	return `\n${rows.join("\n")}\n`;
}

function convertTable(block: string): string {
	return HTML_ROW.test(block) ? tableToRows(block) : sgmlTableToText(block);
}

/**
 * Shared by both views: wrapper markup out, tables to tab-separated rows,
 * block tags to line breaks, remaining tags out, entities decoded.
 */
export function structuralPass(raw: string): string {
	let text = raw.replace(/\r\n?/g, "\n");

	text = text.replace(SGML_HEADER_BLOCKS, "");
	text = text.replace(SEC_DOCUMENT_OPEN, "");
	text = text.replace(WRAPPER_FIELDS, "");
	text = text.replace(WRAPPER_TAGS, "");

	text = text.replace(HTML_COMMENT, "");
	text = text.replace(HTML_TABLE, convertTable);
	text = text.replace(LINE_BREAK_TAGS, "\n");
	text = text.replace(ANY_TAG, "");

	// Numeric entities can encode carriage returns
	return decodeHTML(text).replace(/\r\n?/g, "\n");
}

// ============================================
// Per-View Steps
// ============================================

function applyControlCharPolicy(text: string, policy: ControlCharPolicy, replacement: string): string {
	switch (policy) {
		case "keep":
			return text;
		case "strip":
			return text.replace(CONTROL_CHARS, "");
		case "replace":
			return text.replace(CONTROL_CHARS, replacement.replace(/[\r\n]/g, ""));
	}
}

function repairMojibake(text: string): string {
	return MOJIBAKE_REPAIRS.reduce((repaired, [pattern, original]) => repaired.replace(pattern, original), text);
}

function foldUnicode(text: string): string {
	return UNICODE_FOLDS.reduce((folded, [pattern, ascii]) => folded.replace(pattern, ascii), text);
}

function blankPageMarkers(text: string): string {
	return PAGE_MARKER_LINES.reduce((blanked, pattern) => blanked.replace(pattern, ""), text);
}

export function createDocumentView(text: string): DocumentView {
	return Object.freeze({ text, lines: Object.freeze(text.split("\n")) });
}

/**
 * Build both views of one raw document
 */
export function createDocumentViews(raw: string, options: ViewOptions = {}): DocumentViews {
	const policy = options.controlChars ?? "replace";
	const replacement = options.replacement ?? " ";

	const structural = structuralPass(raw);
	const clean = (text: string): string => applyControlCharPolicy(text.replace(NBSP, " "), policy, replacement);

	// Mojibake is repaired before the control-character policy sees its C1 bytes
	return Object.freeze({
		parsing: createDocumentView(blankPageMarkers(foldUnicode(clean(repairMojibake(structural))))),
		preservation: createDocumentView(clean(structural)),
	});
}
