import type { DestinationStream, Level } from "pino";

export interface NodeLoggerOptions {
  /** Service name attached to every record */
  service: string;
  level?: Level | "silent";
  environment?: string;
  /** Force pino-pretty output (defaults to NODE_ENV === "development") */
  pretty?: boolean;
  /** Write records here instead of stdout (ignored when pretty) */
  destination?: DestinationStream;
}

/**
 * Per-document context bound to child loggers so records from concurrently
 * processed filings stay attributable.
 */
export interface FilingContext {
  file: string;
  cik?: string;
  formType?: string;
}
