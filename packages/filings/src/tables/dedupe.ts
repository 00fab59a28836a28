/**
 * Region Deduplicator
 *
 * Strategies run independently and often find the same table twice. The
 * result owns every line at most once: regions are pairwise disjoint.
 */

import type { Table } from "../types.js";

/**
 * Closed-interval intersection on line ranges
 */
export function overlaps(a: Pick<Table, "startLine" | "endLine">, b: Pick<Table, "startLine" | "endLine">): boolean {
	return a.startLine <= b.endLine && a.endLine >= b.startLine;
}

function byStartThenConfidence(a: Table, b: Table): number {
	return a.startLine - b.startLine || b.confidence - a.confidence;
}

/**
 * Resolve overlapping candidates.
 *
 * Candidates are visited by (start, -confidence). One that overlaps
 * accepted regions replaces them only when its confidence is strictly
 * higher than each of theirs; otherwise it is dropped.
 */
export function dedupe(tables: readonly Table[]): Table[] {
	const candidates = [...tables].sort(byStartThenConfidence);
	let accepted: Table[] = [];

	for (const candidate of candidates) {
		const overlapping = accepted.filter((table) => overlaps(candidate, table));
		if (overlapping.length === 0) {
			accepted.push(candidate);
			continue;
		}
		if (overlapping.every((table) => candidate.confidence > table.confidence)) {
			accepted = accepted.filter((table) => !overlapping.includes(table));
			accepted.push(candidate);
		}
	}

	return accepted.sort(byStartThenConfidence);
}
