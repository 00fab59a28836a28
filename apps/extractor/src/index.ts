#!/usr/bin/env -S node --import tsx
/**
 * MD&A Extraction CLI
 *
 * Extracts the MD&A section from every filing in a directory and writes one
 * result file per filing. Exits 1 when any document failed.
 *
 * Usage:
 *   mdna-extract <input-dir> [options]
 */

import { loadConfig, resolveEnvironment, validateAtStartup } from "@mdna/config";
import { BatchProcessor, createFilingFilter, MdnaExtractor } from "@mdna/filings";
import { applyOverrides, type CliOptions, parseArgs, USAGE, UsageError } from "./cli/args.js";
import { log } from "./shared/logger.js";

// ============================================
// Main
// ============================================

function parseOrExit(): CliOptions {
	try {
		return parseArgs(process.argv.slice(2));
	} catch (error) {
		if (error instanceof UsageError) {
			console.error(error.message);
			console.error(USAGE);
			process.exit(2);
		}
		throw error;
	}
}

async function main(): Promise<number> {
	const options = parseOrExit();

	if (options.help) {
		console.log(USAGE);
		return 0;
	}
	if (options.inputDir === undefined) {
		console.error("Missing <input-dir>");
		console.error(USAGE);
		return 2;
	}

	const environment = options.environment ?? resolveEnvironment();
	const loaded = await loadConfig(environment, options.configDir);
	const config = applyOverrides(loaded, options);

	const startup = validateAtStartup(config);
	for (const warning of startup.warnings) {
		log.warn({ warning }, "Configuration warning");
	}

	const filter = createFilingFilter(config.filter);
	const extractor = new MdnaExtractor({ config, logger: log });
	const processor = new BatchProcessor(extractor, {
		concurrency: config.extraction.concurrency,
		extensions: config.extraction.file_extensions,
		logger: log,
		onProgress: ({ file, status, processed, total }) => {
			log.debug({ file, status, processed, total }, "Document done");
		},
	});

	log.info(
		{ environment, inputDir: options.inputDir, outputDir: config.extraction.output_dir, filter: config.filter },
		"Starting extraction",
	);

	const stats = await processor.processDirectory(options.inputDir, filter);

	console.log("\n--- Extraction Results ---");
	console.log(`  Total: ${stats.total}`);
	console.log(`  Succeeded: ${stats.succeeded}`);
	console.log(`  Failed: ${stats.failed}`);
	console.log(`  Filtered: ${stats.filtered}`);

	return stats.failed > 0 ? 1 : 0;
}

main()
	.then(async (code) => {
		await log.flush();
		process.exit(code);
	})
	.catch(async (error: unknown) => {
		log.error({ error: error instanceof Error ? error.message : String(error) }, "Extraction run failed");
		await log.flush();
		process.exit(1);
	});
