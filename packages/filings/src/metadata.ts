/**
 * Filing Metadata
 *
 * Identity of a filing comes from its filename first; the SGML header at
 * the top of the raw document fills whatever the filename lacks.
 *
 * Filenames follow `YYYYMMDD_10-K_edgar_data_CIK_ACCESSION.txt`, with
 * amendments written as `10-K-A`, `10-K_A`, `10-KA` or `10-K/A`.
 */

import { MissingMetadataError } from "./errors.js";
import { type Filing, type FormType, FormTypeSchema } from "./types.js";

// ============================================
// Types
// ============================================

export interface FilenameMetadata {
	cik?: string;
	formType?: FormType;
	filingDate?: Date;
	accession?: string;
}

export interface HeaderMetadata {
	cik?: string;
	formType?: FormType;
	filingDate?: Date;
	companyName?: string;
}

export const UNKNOWN_COMPANY = "Unknown Company";

/** Raw characters searched for header fields */
const HEADER_LENGTH = 5_000;

// ============================================
// Patterns
// ============================================

const FILENAME = /(\d{8})_(10-[KQ])(?:[-_\/]?(A))?_edgar_data_(\d{1,10})_([0-9-]+)\.txt$/i;

const CIK_FIELDS = [/CENTRAL\s+INDEX\s+KEY:\s*(\d+)/i, /\bCIK:\s*(\d+)/i, /C\.I\.K\.\s*NO\.\s*(\d+)/i];

const FORM_FIELDS = [
	/CONFORMED\s+SUBMISSION\s+TYPE:\s*(10-[KQ])(\/A)?/i,
	/FORM\s+TYPE:\s*(10-[KQ])(\/A)?/i,
	/\bFORM\s+(10-[KQ])(\/A)?\b/i,
];

const COMPACT_DATE_FIELDS = [/FILED\s+AS\s+OF\s+DATE:\s*(\d{4})(\d{2})(\d{2})/i];
const ISO_DATE_FIELDS = [/DATE\s+OF\s+REPORT[^:\n]*:\s*(\d{4})-(\d{2})-(\d{2})/i];

const COMPANY_FIELDS = [
	/COMPANY\s+CONFORMED\s+NAME:\s*([^\n]+)/i,
	/CONFORMED\s+NAME:\s*([^\n]+)/i,
	/REGISTRANT\s+NAME:\s*([^\n]+)/i,
];

// ============================================
// Helpers
// ============================================

export function padCik(cik: string): string {
	return cik.trim().padStart(10, "0");
}

function toFormType(base: string, amended: boolean): FormType | undefined {
	const parsed = FormTypeSchema.safeParse(`${base.toUpperCase()}${amended ? "/A" : ""}`);
	return parsed.success ? parsed.data : undefined;
}

/**
 * UTC date for the given parts, or undefined when they name no real day
 */
function toDate(year: string, month: string, day: string): Date | undefined {
	const y = Number(year);
	const m = Number(month);
	const d = Number(day);
	const date = new Date(Date.UTC(y, m - 1, d));
	if (date.getUTCFullYear() !== y || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
		return undefined;
	}
	return date;
}

function firstMatch(text: string, patterns: readonly RegExp[]): RegExpExecArray | undefined {
	for (const pattern of patterns) {
		const match = pattern.exec(text);
		if (match) {
			return match;
		}
	}
	return undefined;
}

function dateFrom(text: string, patterns: readonly RegExp[]): Date | undefined {
	const match = firstMatch(text, patterns);
	return match ? toDate(match[1] ?? "", match[2] ?? "", match[3] ?? "") : undefined;
}

// ============================================
// Parsing
// ============================================

export function parseFilenameMetadata(name: string): FilenameMetadata {
	const match = FILENAME.exec(name);
	if (!match) {
		return {};
	}
	const [, date = "", form = "", amendment, cik = "", accession] = match;
	return {
		cik: padCik(cik),
		formType: toFormType(form, amendment !== undefined),
		filingDate: toDate(date.slice(0, 4), date.slice(4, 6), date.slice(6, 8)),
		accession,
	};
}

/**
 * Fields from the SGML header within the first 5000 characters of the raw
 * document
 */
export function extractHeaderMetadata(raw: string): HeaderMetadata {
	const header = raw.slice(0, HEADER_LENGTH);

	const cik = firstMatch(header, CIK_FIELDS)?.[1];
	const form = firstMatch(header, FORM_FIELDS);
	const filingDate = dateFrom(header, COMPACT_DATE_FIELDS) ?? dateFrom(header, ISO_DATE_FIELDS);

	let companyName: string | undefined;
	for (const pattern of COMPANY_FIELDS) {
		const name = pattern.exec(header)?.[1]?.replace(/\s+/g, " ").trim();
		if (name !== undefined && name.length > 3 && name.length < 100) {
			companyName = name;
			break;
		}
	}

	return {
		cik: cik === undefined ? undefined : padCik(cik),
		formType: form ? toFormType(form[1] ?? "", form[2] !== undefined) : undefined,
		filingDate,
		companyName,
	};
}

export interface FilingSource {
	filePath: string;
	fileSize: number;
	/** Raw document, before any cleaning */
	raw: string;
}

/**
 * Filing identity from filename, then header. Throws when neither yields
 * a CIK or a form type.
 */
export function resolveFiling(source: FilingSource): Filing {
	const name = source.filePath.split(/[\\/]/).pop() ?? source.filePath;
	const fromName = parseFilenameMetadata(name);
	const fromHeader = extractHeaderMetadata(source.raw);

	const cik = fromName.cik ?? fromHeader.cik;
	const formType = fromName.formType ?? fromHeader.formType;

	if (cik === undefined || formType === undefined) {
		const missing: ("cik" | "formType")[] = [];
		if (cik === undefined) {
			missing.push("cik");
		}
		if (formType === undefined) {
			missing.push("formType");
		}
		throw new MissingMetadataError(missing, source.filePath);
	}

	return {
		cik,
		companyName: fromHeader.companyName ?? UNKNOWN_COMPANY,
		formType,
		filingDate: fromName.filingDate ?? fromHeader.filingDate,
		filePath: source.filePath,
		fileSize: source.fileSize,
	};
}
