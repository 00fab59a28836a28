/**
 * Cross-References
 *
 * References from the section to notes, items, exhibits, pages and named
 * sections elsewhere in the filing. One entry per kind and normalized
 * reference, at its first occurrence.
 */

import { toGlobal } from "../patterns/library.js";
import type { CrossReference, CrossReferenceKind } from "../types.js";

/** Characters of context kept on each side of a reference */
const CONTEXT_RADIUS = 60;

interface ReferencePattern {
	kind: CrossReferenceKind;
	pattern: RegExp;
	normalize: (match: RegExpMatchArray) => string;
}

const REFERENCE_PATTERNS: readonly ReferencePattern[] = [
	{
		kind: "note",
		pattern: /\bnotes?\s+(\d{1,2}[A-Z]?)\b/i,
		normalize: (match) => `Note ${(match[1] ?? "").toUpperCase()}`,
	},
	{
		kind: "item",
		pattern: /\bitems?\s+(\d{1,2}[A-C]?)\b/i,
		normalize: (match) => `Item ${(match[1] ?? "").toUpperCase()}`,
	},
	{
		kind: "exhibit",
		pattern: /\bexhibits?\s+(\d{1,3}(?:\.\d{1,3})?)/i,
		normalize: (match) => `Exhibit ${match[1] ?? ""}`,
	},
	{
		kind: "page",
		pattern: /\bpages?\s+([A-Z]-\d{1,3}|\d{1,4})\b/i,
		normalize: (match) => `Page ${(match[1] ?? "").toUpperCase()}`,
	},
	{
		kind: "section",
		pattern: /\b(?:section|caption)\s+(?:titled|entitled|captioned|headed)\s+["']([^"'\n]{3,80})["']/i,
		normalize: (match) => (match[1] ?? "").replace(/\s+/g, " ").trim(),
	},
];

function contextAround(text: string, start: number, end: number): string {
	return text
		.slice(Math.max(0, start - CONTEXT_RADIUS), Math.min(text.length, end + CONTEXT_RADIUS))
		.replace(/\s+/g, " ")
		.trim();
}

/**
 * Cross-references in `text`, ordered by position
 */
export function findCrossReferences(text: string): CrossReference[] {
	const seen = new Set<string>();
	const references: CrossReference[] = [];

	for (const { kind, pattern, normalize } of REFERENCE_PATTERNS) {
		for (const match of text.matchAll(toGlobal(pattern))) {
			const reference = normalize(match);
			const key = `${kind}:${reference}`;
			if (reference.length === 0 || seen.has(key)) {
				continue;
			}
			seen.add(key);
			const position = match.index ?? 0;
			references.push({
				kind,
				reference,
				context: contextAround(text, position, position + match[0].length),
				position,
			});
		}
	}

	return references.sort((a, b) => a.position - b.position);
}
