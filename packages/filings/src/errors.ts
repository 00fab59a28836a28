/**
 * Extraction Errors
 *
 * Every failure is scoped to one document. The batch driver records it and
 * moves on; nothing here is retried.
 *
 * | Code                 | Error class                | Cause                              |
 * |----------------------|----------------------------|------------------------------------|
 * | UNREADABLE_INPUT     | UnreadableInputError       | file missing or unreadable         |
 * | MISSING_METADATA     | MissingMetadataError       | no CIK or form type derivable      |
 * | SECTION_NOT_FOUND    | SectionNotFoundError       | no MD&A and no incorporation       |
 * | REFERENCE_UNRESOLVED | ReferenceResolutionError   | resolver returned no text          |
 * | INTERNAL             | InternalExtractionError    | unexpected exception               |
 */

import type { IncorporationReference } from "./types.js";

export type ExtractionErrorCode =
	| "UNREADABLE_INPUT"
	| "MISSING_METADATA"
	| "SECTION_NOT_FOUND"
	| "REFERENCE_UNRESOLVED"
	| "INTERNAL";

// ============================================
// Base Error Class
// ============================================

export class ExtractionError extends Error {
	readonly code: ExtractionErrorCode;

	/** Fatal for the document; the batch carries on */
	readonly fatal = true;

	/** Source document, when known */
	readonly filePath?: string;

	constructor(code: ExtractionErrorCode, message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, { cause: options?.cause });
		this.name = "ExtractionError";
		this.code = code;
		this.filePath = options?.filePath;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			fatal: this.fatal,
			message: this.message,
			filePath: this.filePath,
		};
	}
}

// ============================================
// Specific Errors
// ============================================

export class UnreadableInputError extends ExtractionError {
	constructor(filePath: string, cause?: unknown) {
		const reason = cause instanceof Error ? cause.message : "empty file";
		super("UNREADABLE_INPUT", `Could not read ${filePath}: ${reason}`, { filePath, cause });
		this.name = "UnreadableInputError";
	}
}

export class MissingMetadataError extends ExtractionError {
	readonly missing: readonly ("cik" | "formType")[];

	constructor(missing: readonly ("cik" | "formType")[], filePath?: string) {
		super("MISSING_METADATA", `Missing required metadata: ${missing.join(", ")}`, { filePath });
		this.name = "MissingMetadataError";
		this.missing = missing;
	}
}

export class SectionNotFoundError extends ExtractionError {
	constructor(filePath?: string) {
		super("SECTION_NOT_FOUND", "MD&A section not found", { filePath });
		this.name = "SectionNotFoundError";
	}
}

export class ReferenceResolutionError extends ExtractionError {
	readonly reference: IncorporationReference;

	constructor(reference: IncorporationReference, filePath?: string) {
		super(
			"REFERENCE_UNRESOLVED",
			`Could not resolve incorporation by reference to ${reference.documentType}`,
			{ filePath },
		);
		this.name = "ReferenceResolutionError";
		this.reference = reference;
	}
}

export class InternalExtractionError extends ExtractionError {
	constructor(cause: unknown, filePath?: string) {
		const message = cause instanceof Error ? cause.message : String(cause);
		super("INTERNAL", `Extraction failed: ${message}`, { filePath, cause });
		this.name = "InternalExtractionError";
	}
}

// ============================================
// Type Guards
// ============================================

export function isExtractionError(error: unknown): error is ExtractionError {
	return error instanceof ExtractionError;
}

/**
 * Normalize anything thrown during extraction into an ExtractionError
 */
export function toExtractionError(error: unknown, filePath?: string): ExtractionError {
	if (isExtractionError(error)) {
		return error;
	}
	return new InternalExtractionError(error, filePath);
}
