/**
 * Cross-Reference Tests
 */

import { describe, expect, test } from "vitest";
import { findCrossReferences } from "./cross-references.js";

describe("findCrossReferences", () => {
	test("finds each kind and normalizes the reference", () => {
		const text =
			'See NOTE 5 and Item 1a. Exhibit 99.1 is attached. Refer to page F-3 and the section titled "Critical Accounting Estimates".';
		const references = findCrossReferences(text);

		expect(references.map(({ kind, reference }) => [kind, reference])).toEqual([
			["note", "Note 5"],
			["item", "Item 1A"],
			["exhibit", "Exhibit 99.1"],
			["page", "Page F-3"],
			["section", "Critical Accounting Estimates"],
		]);
	});

	test("keeps the first occurrence of a repeated reference", () => {
		const text = "As described in Note 7, revenue grew. Note 7 also covers leases.";
		const references = findCrossReferences(text);

		expect(references).toHaveLength(1);
		expect(references[0]?.position).toBe(text.indexOf("Note 7"));
	});

	test("records the surrounding context with whitespace collapsed", () => {
		const [reference] = findCrossReferences("Details are\n\nin   Note 3.");

		expect(reference?.context).toBe("Details are in Note 3.");
	});

	test("orders references by position", () => {
		const references = findCrossReferences("Exhibit 13 contains it, see Note 2 and page 40.");

		expect(references.map((reference) => reference.position)).toEqual([0, 28, 39]);
	});

	test("returns nothing for plain prose", () => {
		expect(findCrossReferences("Sales grew in every market.")).toEqual([]);
	});
});
