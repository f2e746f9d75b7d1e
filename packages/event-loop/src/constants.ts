/**
 * Constants for @asyncloop/event-loop.
 */

import type { LogLevel } from "./types.js";

export const PACKAGE_NAME = "@asyncloop/event-loop";

/** Tag registered automatically when a loop is built without done specs */
export const DEFAULT_DONE_TAG = "_default";
export const DEFAULT_DONE_TIMEOUT_MS = 2000;
export const DEFAULT_JITTER_PCT = 50;
export const DEFAULT_SCHED_DELAY_MS = 100;
/** A wakeup this close to the fire time counts as on time */
export const WAKEUP_TOLERANCE_MS = 2;
/** Guards firing further than this from their deadline log a warning */
export const GUARD_SKEW_WARN_MS = 10;
export const DEFAULT_LOG_LEVEL: LogLevel = "warn";
export const LOG_LEVEL_ENV = "ASYNCLOOP_LOG_LEVEL";
export const LOG_PREFIX = "[asyncloop]";
