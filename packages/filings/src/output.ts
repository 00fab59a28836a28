/**
 * Extraction Output
 *
 * One text file per filing: a fixed header block followed by the
 * table-fenced section text.
 *
 * ```
 * ================================================================================
 * CIK: 0000012345
 * Company: ACME WIDGETS INC
 * Form Type: 10-K
 * Filing Date: 2021-03-15
 * Extraction Date: 2024-01-01T00:00:00.000Z
 * Word Count: 8123
 * ================================================================================
 *
 * Item 7. Management's Discussion and Analysis ...
 * ```
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ExtractionResult, Filing } from "./types.js";

export type Clock = () => Date;

const RULE = "=".repeat(80);
const MAX_COMPANY_LENGTH = 50;

export const systemClock: Clock = () => new Date();

function formatDate(date: Date | undefined): string {
	return date ? date.toISOString().slice(0, 10) : "unknown";
}

export function formatOutput(result: ExtractionResult, extractedAt: Date): string {
	const { filing } = result;
	return [
		RULE,
		`CIK: ${filing.cik}`,
		`Company: ${filing.companyName}`,
		`Form Type: ${filing.formType}`,
		`Filing Date: ${formatDate(filing.filingDate)}`,
		`Extraction Date: ${extractedAt.toISOString()}`,
		`Word Count: ${result.wordCount}`,
		RULE,
		"",
		result.text,
	].join("\n");
}

/**
 * `(CIK)_(Company)_(Date)_(Form).txt`, safe on every file system
 */
export function outputFilename(filing: Filing): string {
	const company = filing.companyName.replace(/[^\w\s-]/g, "").slice(0, MAX_COMPANY_LENGTH);
	const form = filing.formType.replace("/", "_");
	return `(${filing.cik})_(${company})_(${formatDate(filing.filingDate)})_(${form}).txt`;
}

/**
 * Write the formatted result into `outputDir`, creating it if needed.
 * Returns the written path.
 */
export async function writeExtraction(
	result: ExtractionResult,
	outputDir: string,
	clock: Clock = systemClock,
): Promise<string> {
	await mkdir(outputDir, { recursive: true });
	const path = join(outputDir, outputFilename(result.filing));
	await writeFile(path, formatOutput(result, clock()), "utf8");
	return path;
}
