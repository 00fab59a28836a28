import pino from "pino";

export {
	createNodeLogger,
	type LifecycleLogger,
	levelFromEnv,
	withFilingContext,
} from "./node.js";
export * from "./types.js";

export type { Logger } from "pino";
export { pino };
