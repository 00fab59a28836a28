/**
 * MD&A Extractor
 *
 * Per-document pipeline:
 * 1. Build the parsing and preservation views of the raw document
 * 2. Derive the filing identity from filename and header
 * 3. Locate the section in the parsing view (or resolve a reference)
 * 4. Map the section offsets to lines and slice the preservation view
 * 5. Fence tables and collapse prose
 * 6. Validate, then collect subsections and cross-references
 *
 * @example
 * ```typescript
 * const extractor = new MdnaExtractor({ config: await loadConfig("production") });
 * const outcome = await extractor.extractFromFile("data/20210315_10-K_edgar_data_12345_1.txt");
 * if (outcome.status === "failed") {
 *   console.error(outcome.error.code);
 * }
 * ```
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { ExtractorConfig } from "@mdna/config";
import { type Logger, withFilingContext } from "@mdna/logger";
import {
	type ExtractionError,
	ReferenceResolutionError,
	SectionNotFoundError,
	UnreadableInputError,
	toExtractionError,
} from "./errors.js";
import { log } from "./logger.js";
import { resolveFiling } from "./metadata.js";
import { type Clock, systemClock, writeExtraction } from "./output.js";
import { createPatternLibrary } from "./patterns/library.js";
import { offsetsToLines, sliceLines } from "./reconciler.js";
import { ExhibitReferenceResolver, type ReferenceResolver } from "./resolver.js";
import { findCrossReferences } from "./sections/cross-references.js";
import { SectionLocator } from "./sections/locator.js";
import { extractSubsections } from "./sections/subsections.js";
import { SectionValidator } from "./sections/validator.js";
import { TableFencer } from "./tables/assembly.js";
import { LineClassifier } from "./tables/classifier.js";
import { TableDetector, detectorOptions } from "./tables/detector.js";
import type { ExtractionResult, Filing, IncorporationReference, SectionLocation, SectionValidation } from "./types.js";
import { type DocumentView, type ViewOptions, createDocumentViews } from "./views.js";

// ============================================
// Types
// ============================================

export interface ExtractorOptions {
	config: ExtractorConfig;
	/** Defaults to looking up the referenced exhibit in the same submission */
	resolver?: ReferenceResolver;
	clock?: Clock;
	logger?: Logger;
}

export interface DocumentSource {
	filePath: string;
	fileSize: number;
}

export type ExtractionOutcome =
	| { status: "succeeded"; filePath: string; outputPath: string; result: ExtractionResult }
	| { status: "failed"; filePath: string; error: ExtractionError };

interface SectionText {
	lines: readonly string[];
	startOffset: number;
	endOffset: number;
	validation: SectionValidation;
	incorporatedFrom?: IncorporationReference;
}

// ============================================
// Extractor
// ============================================

export class MdnaExtractor {
	private readonly config: ExtractorConfig;
	private readonly viewOptions: ViewOptions;
	private readonly locator: SectionLocator;
	private readonly validator: SectionValidator;
	private readonly fencer: TableFencer;
	private readonly resolver: ReferenceResolver;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(options: ExtractorOptions) {
		const { config } = options;
		const patterns = createPatternLibrary(config.tables.pattern_set);
		const classifier = new LineClassifier(patterns);

		this.config = config;
		this.viewOptions = {
			controlChars: config.text.control_chars,
			replacement: config.text.control_char_replacement,
		};
		this.locator = new SectionLocator(patterns, {
			incorporationMaxWords: config.sections.incorporation_max_words,
		});
		this.validator = new SectionValidator(patterns, {
			minWords: config.sections.min_words,
			maxWords: config.sections.max_words,
		});
		this.fencer = new TableFencer(classifier, new TableDetector(classifier, detectorOptions(config.tables)));
		this.resolver = options.resolver ?? new ExhibitReferenceResolver(patterns, this.viewOptions);
		this.clock = options.clock ?? systemClock;
		this.logger = options.logger ?? log;
	}

	/**
	 * Extract the MD&A section from a raw document.
	 *
	 * @throws ExtractionError subclasses for every per-document failure
	 */
	async extractFromContent(
		content: string,
		source: DocumentSource,
		logger: Logger = this.logger,
	): Promise<ExtractionResult> {
		if (content.trim().length === 0) {
			throw new UnreadableInputError(source.filePath);
		}

		const filing = resolveFiling({ ...source, raw: content });
		const docLog = withFilingContext(logger, {
			file: basename(source.filePath),
			cik: filing.cik,
			formType: filing.formType,
		});

		const { parsing, preservation } = createDocumentViews(content, this.viewOptions);
		const location = this.locator.locate(parsing.text, filing.formType);

		const section = await this.sectionText(location, { filing, content, parsing, preservation }, docLog);

		const { text, tables } = this.fencer.assemble(section.lines);

		if (section.validation.warnings.length > 0) {
			docLog.warn({ warnings: section.validation.warnings }, "Section validation warnings");
		}

		return {
			filing,
			text,
			startOffset: section.startOffset,
			endOffset: section.endOffset,
			wordCount: section.validation.wordCount,
			subsections: extractSubsections(text),
			crossReferences: findCrossReferences(text),
			tables,
			warnings: section.validation.warnings,
			incorporatedFrom: section.incorporatedFrom,
		};
	}

	private async sectionText(
		location: SectionLocation,
		document: { filing: Filing; content: string; parsing: DocumentView; preservation: DocumentView },
		docLog: Logger,
	): Promise<SectionText> {
		const { filing, parsing, preservation } = document;

		switch (location.kind) {
			case "missing":
				throw new SectionNotFoundError(filing.filePath);

			case "section": {
				const { start, end, heading } = location.bounds;
				const range = offsetsToLines(parsing.text, start, end - 1);
				docLog.debug({ heading, ...range }, "Located MD&A section");
				return {
					lines: sliceLines(preservation.lines, range),
					startOffset: start,
					endOffset: end,
					validation: this.validator.validateSection(parsing.text, start, end, filing.formType),
				};
			}

			case "incorporated": {
				const { reference } = location;
				docLog.info(
					{ documentType: reference.documentType, pages: reference.pages },
					"MD&A incorporated by reference",
				);
				const substitute = await this.resolver.resolve(reference, { filing, rawContent: document.content });
				if (substitute === undefined || substitute.trim().length === 0) {
					throw new ReferenceResolutionError(reference, filing.filePath);
				}
				return {
					lines: substitute.split("\n"),
					startOffset: 0,
					endOffset: substitute.length,
					validation: this.validator.validateSection(substitute, 0, substitute.length, filing.formType),
					incorporatedFrom: reference,
				};
			}
		}
	}

	/**
	 * Read, extract and write one file. Never throws: every failure comes
	 * back as a `failed` outcome.
	 */
	async extractFromFile(filePath: string): Promise<ExtractionOutcome> {
		const fileLog = withFilingContext(this.logger, { file: basename(filePath) });

		try {
			const { content, fileSize } = await readDocument(filePath);
			const result = await this.extractFromContent(content, { filePath, fileSize });
			const outputPath = await writeExtraction(result, this.config.extraction.output_dir, this.clock);

			fileLog.info(
				{
					outputPath,
					wordCount: result.wordCount,
					tables: result.tables.length,
					incorporated: result.incorporatedFrom !== undefined,
				},
				"Extracted MD&A",
			);
			return { status: "succeeded", filePath, outputPath, result };
		} catch (error) {
			const failure = toExtractionError(error, filePath);
			fileLog.error({ error: failure.toJSON() }, "Extraction failed");
			return { status: "failed", filePath, error: failure };
		}
	}
}

async function readDocument(filePath: string): Promise<{ content: string; fileSize: number }> {
	try {
		const buffer = await readFile(filePath);
		return { content: buffer.toString("utf8"), fileSize: buffer.length };
	} catch (error) {
		throw new UnreadableInputError(filePath, error);
	}
}
