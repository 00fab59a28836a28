/**
 * Batch Driver
 *
 * Runs the extractor over every matching file in a directory. Documents
 * are processed in groups of `concurrency`; counters are tallied from the
 * per-document outcomes once each group settles.
 *
 * @example
 * ```typescript
 * const processor = new BatchProcessor(extractor, { concurrency: 4, extensions: [".txt"] });
 * const stats = await processor.processDirectory("data/filings", createFilingFilter(config.filter));
 * console.log(`${stats.succeeded}/${stats.total} extracted`);
 * ```
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "@mdna/logger";
import type { ExtractionOutcome } from "./extractor.js";
import type { FilingFilter } from "./filter.js";
import { log } from "./logger.js";
import { parseFilenameMetadata } from "./metadata.js";
import type { BatchStats, ProgressCallback } from "./types.js";

// ============================================
// Types
// ============================================

export interface DocumentExtractor {
	extractFromFile(filePath: string): Promise<ExtractionOutcome>;
}

export interface BatchOptions {
	/** Documents in flight at once */
	concurrency: number;
	/** Matched case-sensitively against the end of each filename */
	extensions: readonly string[];
	onProgress?: ProgressCallback;
	logger?: Logger;
}

// ============================================
// Helpers
// ============================================

function chunkArray<T>(array: readonly T[], size: number): T[][] {
	const chunks: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		chunks.push(array.slice(i, i + size));
	}
	return chunks;
}

// ============================================
// Processor
// ============================================

export class BatchProcessor {
	private readonly logger: Logger;

	constructor(
		private readonly extractor: DocumentExtractor,
		private readonly options: BatchOptions,
	) {
		this.logger = options.logger ?? log;
	}

	/**
	 * Matching filenames in `dir`, sorted
	 */
	async listDocuments(dir: string): Promise<string[]> {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((entry) => entry.isFile() && this.options.extensions.some((ext) => entry.name.endsWith(ext)))
			.map((entry) => entry.name)
			.sort();
	}

	async processDirectory(dir: string, filter?: FilingFilter): Promise<BatchStats> {
		const names = await this.listDocuments(dir);
		const stats: BatchStats = { total: names.length, succeeded: 0, failed: 0, filtered: 0 };
		let processed = 0;

		const report = (file: string, status: "succeeded" | "failed" | "filtered"): void => {
			processed++;
			this.options.onProgress?.({ file, status, processed, total: stats.total });
		};

		this.logger.info({ dir, total: stats.total, filtered: filter?.isActive ?? false }, "Processing directory");

		const selected: string[] = [];
		for (const name of names) {
			if (filter?.isActive && !filter.shouldProcess(parseFilenameMetadata(name))) {
				stats.filtered++;
				report(name, "filtered");
				continue;
			}
			selected.push(name);
		}

		for (const group of chunkArray(selected, Math.max(1, this.options.concurrency))) {
			const outcomes = await Promise.all(group.map((name) => this.extractor.extractFromFile(join(dir, name))));
			for (const [index, outcome] of outcomes.entries()) {
				stats[outcome.status]++;
				report(group[index] ?? outcome.filePath, outcome.status);
			}
		}

		this.logger.info({ dir, ...stats }, "Batch complete");
		return stats;
	}
}
