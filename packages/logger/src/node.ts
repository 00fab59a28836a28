import pino, { type Level, type Logger, type LoggerOptions } from "pino";
import type { FilingContext, NodeLoggerOptions } from "./types.js";

type LoggerState = "active" | "flushing" | "destroyed";

export interface LifecycleLogger extends Logger {
  flush(): Promise<void>;
  destroy(): Promise<void>;
}

function wrapLoggerWithLifecycle(baseLogger: Logger): LifecycleLogger {
  let state: LoggerState = "active";
  let flushPromise: Promise<void> | null = null;

  const wrappedLogger: LifecycleLogger = Object.create(baseLogger);

  // Records written after destroy() are dropped
  const logMethods = ["trace", "debug", "info", "warn", "error", "fatal"] as const;
  for (const method of logMethods) {
    const original = baseLogger[method];
    Object.defineProperty(wrappedLogger, method, {
      writable: true,
      value: (...args: unknown[]): void => {
        if (state === "destroyed") {
          return;
        }
        Reflect.apply(original, baseLogger, args);
      },
    });
  }

  wrappedLogger.flush = async (): Promise<void> => {
    if (state === "destroyed") {
      return;
    }
    if (flushPromise) {
      return flushPromise;
    }
    state = "flushing";
    flushPromise = new Promise<void>((resolve) => {
      baseLogger.flush(() => {
        state = "active";
        flushPromise = null;
        resolve();
      });
    });
    return flushPromise;
  };

  wrappedLogger.destroy = async (): Promise<void> => {
    if (state === "destroyed") {
      return;
    }
    await wrappedLogger.flush();
    state = "destroyed";
  };

  return wrappedLogger;
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
  const { service, level = "info", environment, pretty, destination } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      bindings: () => ({}), // Remove pid, hostname
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    base: {
      service,
      environment,
    },
  };

  let baseLogger: Logger;

  if (isPretty) {
    baseLogger = pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,environment",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  } else if (destination) {
    baseLogger = pino(loggerOptions, destination);
  } else {
    baseLogger = pino(loggerOptions);
  }

  return wrapLoggerWithLifecycle(baseLogger);
}

export function withFilingContext(logger: Logger, context: FilingContext): Logger {
  return logger.child({
    file: context.file,
    cik: context.cik,
    formType: context.formType,
  });
}

/**
 * Resolve a pino level from the LOG_LEVEL environment variable.
 */
export function levelFromEnv(fallback: Level = "info"): Level | "silent" {
  const value = process.env.LOG_LEVEL;
  switch (value) {
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return value;
    default:
      return fallback;
  }
}
