import { pino, type Logger } from "pino";

export type { Logger };

export interface LogContext {
  component: string;
  requestId?: string;
  [key: string]: unknown;
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level?: string;
  /** Human-readable output through pino-pretty instead of JSON lines. */
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "city-poster",
    level: options.level || "info",
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard" },
        }
      : undefined,
  });
}

/** Process-wide logger from the environment as it is at import time. */
export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL,
  pretty: process.env.LOG_PRETTY === "1" || process.env.LOG_PRETTY === "true",
});

/**
 * Child logger for one component or request. Every line it writes carries
 * the given context fields.
 */
export function createScopedLogger(context: LogContext, parent: Logger = logger): Logger {
  return parent.child(context);
}
