/**
 * Console logging for the event loop.
 *
 * Lines are prefixed `[asyncloop]`; picocolors turns color off when
 * stdout is not a TTY.
 */

import pc from "picocolors";
import { LOG_PREFIX } from "./constants.js";
import type { LogLevel, LoopLogger } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

const LOG_LEVELS = Object.keys(LEVEL_RANK);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * Parse a log level from free text (e.g. an env var).
 * @returns undefined for missing or unrecognised values
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

export function createConsoleLogger(level: LogLevel): LoopLogger {
  const enabled = (messageLevel: LogLevel): boolean =>
    LEVEL_RANK[messageLevel] <= LEVEL_RANK[level];

  return {
    debug(message) {
      if (enabled("debug")) console.debug(pc.dim(`${LOG_PREFIX} ${message}`));
    },
    info(message) {
      if (enabled("info")) console.info(`${LOG_PREFIX} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${LOG_PREFIX} ${pc.yellow("WARNING")}: ${message}`);
    },
    error(message) {
      if (enabled("error")) console.error(`${LOG_PREFIX} ${pc.red(`ERR: ${message}`)}`);
    },
  };
}

/** A logger that drops everything */
export const silentLogger: LoopLogger = createConsoleLogger("silent");
