/**
 * Batch Driver Tests
 */

import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { ExtractorConfigSchema, FilterSettingsSchema } from "@mdna/config";
import { createNodeLogger } from "@mdna/logger";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BatchProcessor, type DocumentExtractor } from "./batch.js";
import { UnreadableInputError } from "./errors.js";
import type { ExtractionOutcome } from "./extractor.js";
import { MdnaExtractor } from "./extractor.js";
import { createFilingFilter } from "./filter.js";
import type { ProgressCallback } from "./types.js";

const logger = createNodeLogger({ service: "test", level: "silent", pretty: false });

/**
 * Succeeds for every file except those whose name contains "bad"
 */
class FakeExtractor implements DocumentExtractor {
	readonly calls: string[] = [];
	inFlight = 0;
	maxInFlight = 0;

	async extractFromFile(filePath: string): Promise<ExtractionOutcome> {
		this.calls.push(basename(filePath));
		this.inFlight++;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
		await new Promise((resolve) => setTimeout(resolve, 5));
		this.inFlight--;

		if (basename(filePath).includes("bad")) {
			return { status: "failed", filePath, error: new UnreadableInputError(filePath) };
		}
		return this.succeed(filePath);
	}

	private succeed(filePath: string): ExtractionOutcome {
		return {
			status: "succeeded",
			filePath,
			outputPath: `${filePath}.out`,
			result: {
				filing: { cik: "0000000001", companyName: "Test", formType: "10-K", filePath, fileSize: 1 },
				text: "",
				startOffset: 0,
				endOffset: 0,
				wordCount: 0,
				subsections: [],
				crossReferences: [],
				tables: [],
				warnings: [],
			},
		};
	}
}

describe("BatchProcessor", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "mdna-batch-"));
		for (const name of [
			"20200301_10-K_edgar_data_1_1.txt",
			"20210301_10-K_edgar_data_2_1.TXT",
			"20210801_10-Q_edgar_data_3_bad.txt",
			"20220301_10-K_edgar_data_4_1.txt",
			"notes.md",
		]) {
			await writeFile(join(dir, name), "content", "utf8");
		}
		await mkdir(join(dir, "nested.txt"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("lists matching files in name order", async () => {
		const processor = new BatchProcessor(new FakeExtractor(), { concurrency: 2, extensions: [".txt", ".TXT"], logger });

		expect(await processor.listDocuments(dir)).toEqual([
			"20200301_10-K_edgar_data_1_1.txt",
			"20210301_10-K_edgar_data_2_1.TXT",
			"20210801_10-Q_edgar_data_3_bad.txt",
			"20220301_10-K_edgar_data_4_1.txt",
		]);
	});

	test("tallies outcomes and honors the concurrency limit", async () => {
		const extractor = new FakeExtractor();
		const processor = new BatchProcessor(extractor, { concurrency: 2, extensions: [".txt", ".TXT"], logger });

		const stats = await processor.processDirectory(dir);

		expect(stats).toEqual({ total: 4, succeeded: 3, failed: 1, filtered: 0 });
		expect(extractor.maxInFlight).toBe(2);
		expect(extractor.calls).toHaveLength(4);
	});

	test("skips filtered files without extracting them", async () => {
		const extractor = new FakeExtractor();
		const progress: Parameters<ProgressCallback>[0][] = [];
		const processor = new BatchProcessor(extractor, {
			concurrency: 4,
			extensions: [".txt"],
			logger,
			onProgress: (event) => progress.push(event),
		});
		const filter = createFilingFilter(FilterSettingsSchema.parse({ years: [2020, 2022] }));

		const stats = await processor.processDirectory(dir, filter);

		expect(stats).toEqual({ total: 3, succeeded: 2, failed: 0, filtered: 1 });
		expect(extractor.calls).toEqual(["20200301_10-K_edgar_data_1_1.txt", "20220301_10-K_edgar_data_4_1.txt"]);
		expect(progress.map(({ file, status, processed }) => [file, status, processed])).toEqual([
			["20210801_10-Q_edgar_data_3_bad.txt", "filtered", 1],
			["20200301_10-K_edgar_data_1_1.txt", "succeeded", 2],
			["20220301_10-K_edgar_data_4_1.txt", "succeeded", 3],
		]);
	});

	test("runs the real extractor end to end", async () => {
		const input = join(dir, "input");
		const output = join(dir, "output");
		await mkdir(input);
		await writeFile(
			join(input, "20210315_10-K_edgar_data_12345_1.txt"),
			"Item 7. Management's Discussion and Analysis\n\nOverview\n\nRevenue grew in every market this year.\n\nItem 8. Financial Statements\n",
			"utf8",
		);
		await writeFile(join(input, "20210315_10-K_edgar_data_67890_1.txt"), "No narrative here.\n", "utf8");

		const config = ExtractorConfigSchema.parse({ sections: { min_words: 1 }, extraction: { output_dir: output } });
		const extractor = new MdnaExtractor({ config, logger, clock: () => new Date(0) });
		const processor = new BatchProcessor(extractor, { concurrency: 2, extensions: [".txt"], logger });

		const stats = await processor.processDirectory(input);

		expect(stats).toEqual({ total: 2, succeeded: 1, failed: 1, filtered: 0 });
		expect(await readdir(output)).toEqual(["(0000012345)_(Unknown Company)_(2021-03-15)_(10-K).txt"]);
	});

	test("rejects when the directory does not exist", async () => {
		const processor = new BatchProcessor(new FakeExtractor(), { concurrency: 1, extensions: [".txt"], logger });

		await expect(processor.processDirectory(join(dir, "absent"))).rejects.toThrow();
	});
});
