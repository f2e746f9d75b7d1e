export const PACKAGE_NAME = "@asyncloop/test-utils" as const;

export { ManualClock } from "./clock.js";
export { CapturingLogger, type LogEntry } from "./logger.js";
export { constantRandom, scriptedRandom } from "./random.js";
