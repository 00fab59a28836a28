/**
 * Shared Logger
 *
 * Logger for the extraction CLI; the engine's records are written through it.
 */

import { createNodeLogger, type LifecycleLogger, levelFromEnv } from "@mdna/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "extractor",
	level: levelFromEnv(),
	environment: process.env.MDNA_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
