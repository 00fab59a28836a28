/**
 * @mdna/filings
 *
 * MD&A extraction engine for SEC 10-K and 10-Q filings.
 *
 * @example
 * ```typescript
 * import { BatchProcessor, MdnaExtractor, createFilingFilter } from "@mdna/filings";
 *
 * const extractor = new MdnaExtractor({ config });
 * const processor = new BatchProcessor(extractor, {
 *   concurrency: config.extraction.concurrency,
 *   extensions: config.extraction.file_extensions,
 * });
 * const stats = await processor.processDirectory("data", createFilingFilter(config.filter));
 * ```
 */

// Batch
export { BatchProcessor, type BatchOptions, type DocumentExtractor } from "./batch.js";
// Errors
export {
	ExtractionError,
	type ExtractionErrorCode,
	InternalExtractionError,
	isExtractionError,
	MissingMetadataError,
	ReferenceResolutionError,
	SectionNotFoundError,
	toExtractionError,
	UnreadableInputError,
} from "./errors.js";
// Extractor
export {
	type DocumentSource,
	type ExtractionOutcome,
	type ExtractorOptions,
	MdnaExtractor,
} from "./extractor.js";
export { createFilingFilter, type FilingFilter } from "./filter.js";
export { log } from "./logger.js";
// Metadata
export {
	extractHeaderMetadata,
	type FilenameMetadata,
	type FilingSource,
	type HeaderMetadata,
	padCik,
	parseFilenameMetadata,
	resolveFiling,
	UNKNOWN_COMPANY,
} from "./metadata.js";
// Output
export { type Clock, formatOutput, outputFilename, systemClock, writeExtraction } from "./output.js";
// Patterns
export {
	BASIC_TABLE_PATTERNS,
	createPatternLibrary,
	EXTENDED_TABLE_PATTERNS,
	type PatternLibrary,
	type SectionPatterns,
	type TablePatterns,
} from "./patterns/index.js";
export { type LineRange, offsetsToLines, sliceLines } from "./reconciler.js";
// Resolver
export {
	ExhibitReferenceResolver,
	type ReferenceResolver,
	type ResolutionContext,
} from "./resolver.js";
// Sections
export { findCrossReferences } from "./sections/cross-references.js";
export { type LocatorOptions, SectionLocator } from "./sections/locator.js";
export { extractSubsections } from "./sections/subsections.js";
export { SectionValidator, type ValidatorOptions } from "./sections/validator.js";
// Tables
export { type AssembledSection, TABLE_FENCE_END, TABLE_FENCE_START, TableFencer } from "./tables/assembly.js";
export { LineClassifier } from "./tables/classifier.js";
export { dedupe } from "./tables/dedupe.js";
export { DEFAULT_DETECTOR_OPTIONS, type DetectorOptions, detectorOptions, TableDetector } from "./tables/detector.js";
// Types
export * from "./types.js";
// Views
export { createDocumentViews, type DocumentView, type DocumentViews, type ViewOptions } from "./views.js";
