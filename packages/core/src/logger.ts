/**
 * Scoped console logging.
 *
 * Every message is prefixed with `[smartnumber/<scope>]` and a level label,
 * and is filtered against the `logLevel` configuration value, read on each
 * call so `config.set({ logLevel })` takes effect immediately.
 *
 * @example
 * ```typescript
 * const log = createLogger("reduce");
 * log.warn("iteration cap reached");
 * // [smartnumber/reduce] WARN: iteration cap reached
 * ```
 */

import { config, type LogLevel } from "./config.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * The configured threshold, or "warn" when the value is missing or unknown.
 */
export function currentLogLevel(): LogLevel {
  const level = config.get("logLevel");
  return isLogLevel(level) ? level : "warn";
}

function enabled(level: Exclude<LogLevel, "off">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
}

/**
 * Create a logger whose messages carry the given scope.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[smartnumber/${scope}]`;

  return {
    scope,
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} DEBUG: ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`${prefix} INFO: ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} WARN: ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ERROR: ${message}`, ...details);
    },
  };
}
