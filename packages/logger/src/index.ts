/**
 * @urlkit/logger
 *
 * pino loggers for the shortener packages. Each component asks for a named
 * logger, or takes one injected so tests can pass `createSilentLogger()`.
 *
 * ```ts
 * const log = createLogger("cache");
 * log.warn({ err, key }, "Redis GET failed, reading fallback");
 * ```
 */

import pino from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL || "info";
const NODE_ENV = process.env.NODE_ENV || "development";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface CreateLoggerOptions {
  /** Overrides LOG_LEVEL for this logger */
  level?: LogLevel;
}

/**
 * JSON lines with an ISO `time` and a textual `level`; human-readable
 * output only when NODE_ENV is development.
 */
export function createLogger(component: string, options: CreateLoggerOptions = {}): pino.Logger {
  return pino({
    name: `urlkit:${component}`,
    level: options.level ?? LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport:
      NODE_ENV === "development"
        ? {
            target: "pino-pretty",
            options: { colorize: true, ignore: "pid,hostname" },
          }
        : undefined,
    base: { component, env: NODE_ENV },
  });
}

/** Drops every record */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

export type { Logger } from "pino";
