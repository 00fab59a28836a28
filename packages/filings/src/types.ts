/**
 * Filings Package Types
 *
 * Shared shapes for the MD&A extraction engine: document identity,
 * section location results, table regions and the final extraction.
 */

import { z } from "zod";

// ============================================
// Filing Types
// ============================================

export const FormTypeSchema = z.enum(["10-K", "10-K/A", "10-Q", "10-Q/A"]);
export type FormType = z.infer<typeof FormTypeSchema>;

/**
 * Identity of one filing document
 */
export interface Filing {
	/** Central Index Key, zero padded to 10 digits */
	cik: string;
	companyName: string;
	formType: FormType;
	filingDate?: Date;
	filePath: string;
	fileSize: number;
}

// ============================================
// Line Classification
// ============================================

export type LineClassification =
	| "empty"
	| "table_delimiter"
	| "monetary_data"
	| "table_header"
	| "table_content"
	| "table_continuation"
	| "potential_table"
	| "regular_text";

/**
 * Up to three neighboring lines on each side of the classified line
 */
export interface LineWindow {
	readonly before: readonly string[];
	readonly after: readonly string[];
}

// ============================================
// Tables
// ============================================

export type TableType = "financial" | "delimited" | "aligned" | "mixed";

export type DetectionStrategy = "financial" | "delimited" | "pipe" | "monetary";

/**
 * One detected table region. Line numbers are 0-based and inclusive.
 */
export interface Table {
	readonly startLine: number;
	readonly endLine: number;
	readonly title?: string;
	readonly tableType: TableType;
	readonly strategy: DetectionStrategy;
	/** Heuristic score in [0, 1], used only to break overlap ties */
	readonly confidence: number;
	/** The region's lines joined verbatim */
	readonly originalText: string;
	/** Cells per non-blank, non-rule line */
	readonly rows: readonly (readonly string[])[];
	/** Non-blank lines in the region */
	readonly rowCount: number;
	/** Widest row */
	readonly columnCount: number;
	readonly hasMonetaryData: boolean;
	readonly hasPercentageData: boolean;
}

// ============================================
// Sections
// ============================================

/**
 * Offsets into the parsing view; `end` is exclusive
 */
export interface SectionBounds {
	start: number;
	end: number;
	heading: string;
}

/**
 * The section's content is declared to live in another document
 */
export interface IncorporationReference {
	/** e.g. "Exhibit 13", "Annual Report to Shareholders", "Proxy Statement" */
	documentType: string;
	/** Sentence carrying the reference */
	locator: string;
	/** Page range named in the reference, e.g. "F-1 through F-30" */
	pages?: string;
	matchedText: string;
	position: number;
}

export type SectionLocation =
	| { kind: "section"; bounds: SectionBounds }
	| { kind: "incorporated"; reference: IncorporationReference; bounds?: SectionBounds }
	| { kind: "missing" };

export interface SectionValidation {
	isValid: boolean;
	wordCount: number;
	warnings: string[];
}

export interface Subsection {
	title: string;
	/** Line index within the section text */
	line: number;
	/** Character offset within the section text */
	offset: number;
}

export type CrossReferenceKind = "note" | "item" | "exhibit" | "page" | "section";

export interface CrossReference {
	kind: CrossReferenceKind;
	/** Normalized reference, e.g. "Note 5", "Item 1A", "Exhibit 99.1" */
	reference: string;
	/** Surrounding text */
	context: string;
	position: number;
}

// ============================================
// Extraction Result
// ============================================

export interface ExtractionResult {
	filing: Filing;
	/** Section text from the preservation view, tables fenced */
	text: string;
	/** Offsets into the parsing view the section was located at */
	startOffset: number;
	endOffset: number;
	wordCount: number;
	subsections: Subsection[];
	crossReferences: CrossReference[];
	/** Informational; tables stay inline in `text` */
	tables: Table[];
	warnings: string[];
	incorporatedFrom?: IncorporationReference;
}

// ============================================
// Batch Processing
// ============================================

export interface BatchStats {
	total: number;
	succeeded: number;
	failed: number;
	filtered: number;
}

export type ProgressCallback = (progress: {
	file: string;
	status: "succeeded" | "failed" | "filtered";
	processed: number;
	total: number;
}) => void;
