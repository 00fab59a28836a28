import { createNodeLogger, type LifecycleLogger, levelFromEnv } from "@mdna/logger";

export const log: LifecycleLogger = createNodeLogger({
	service: "filings",
	level: levelFromEnv(),
	environment: process.env.MDNA_ENV ?? "development",
	pretty: process.env.NODE_ENV === "development",
});
