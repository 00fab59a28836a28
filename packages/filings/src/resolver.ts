/**
 * Reference Resolver
 *
 * When a filing incorporates its MD&A by reference, a resolver supplies
 * the substitute text. The default resolver looks inside the same
 * submission for the referenced exhibit, which is where the annual report
 * to shareholders usually travels (EX-13).
 *
 * @example
 * ```typescript
 * const resolver = new ExhibitReferenceResolver(createPatternLibrary());
 * const text = await resolver.resolve(reference, { filing, rawContent });
 * ```
 */

import type { PatternLibrary } from "./patterns/library.js";
import { offsetsToLines } from "./reconciler.js";
import type { Filing, IncorporationReference } from "./types.js";
import { createDocumentViews, type ViewOptions } from "./views.js";

// ============================================
// Types
// ============================================

export interface ResolutionContext {
	filing: Filing;
	/** The whole raw submission the reference was found in */
	rawContent: string;
}

export interface ReferenceResolver {
	/**
	 * Substitute section text in preservation form, or undefined when the
	 * referenced document is not available
	 */
	resolve(reference: IncorporationReference, context: ResolutionContext): Promise<string | undefined>;
}

// ============================================
// Exhibit Resolver
// ============================================

const DOCUMENT_BLOCK = /<DOCUMENT>([\s\S]*?)(?:<\/DOCUMENT>|$)/gi;
const DOCUMENT_TYPE = /<TYPE>[ \t]*([^\s<]+)/i;
const EXHIBIT_NUMBER = /^Exhibit\s+(\d+)/i;

/** Annual reports to shareholders are filed as Exhibit 13 */
const ANNUAL_REPORT_EXHIBIT = "13";

/**
 * Exhibit number the reference points at, if it points inside the filing
 */
export function exhibitNumberOf(reference: IncorporationReference): string | undefined {
	const exhibit = EXHIBIT_NUMBER.exec(reference.documentType);
	if (exhibit) {
		return exhibit[1];
	}
	if (reference.documentType === "Annual Report to Shareholders") {
		return ANNUAL_REPORT_EXHIBIT;
	}
	return undefined;
}

export class ExhibitReferenceResolver implements ReferenceResolver {
	constructor(
		private readonly patterns: PatternLibrary,
		private readonly viewOptions: ViewOptions = {},
	) {}

	async resolve(reference: IncorporationReference, context: ResolutionContext): Promise<string | undefined> {
		const exhibit = exhibitNumberOf(reference);
		if (exhibit === undefined) {
			return undefined;
		}

		const document = findExhibit(context.rawContent, exhibit);
		if (document === undefined) {
			return undefined;
		}

		const { parsing, preservation } = createDocumentViews(document, this.viewOptions);
		const heading = this.patterns.sections.standalone.exec(parsing.text);
		const startLine = heading ? offsetsToLines(parsing.text, heading.index).startLine : 0;
		const text = preservation.lines.slice(startLine).join("\n").trim();

		return text.length > 0 ? text : undefined;
	}
}

/**
 * Raw body of the first `<DOCUMENT>` whose type is `EX-<exhibit>` or one of
 * its sub-exhibits
 */
export function findExhibit(raw: string, exhibit: string): string | undefined {
	const wanted = new RegExp(`^EX-${exhibit}(?:\\.\\d+)?$`, "i");
	for (const block of raw.matchAll(DOCUMENT_BLOCK)) {
		const body = block[1] ?? "";
		const type = DOCUMENT_TYPE.exec(body)?.[1];
		if (type !== undefined && wanted.test(type)) {
			return body;
		}
	}
	return undefined;
}
