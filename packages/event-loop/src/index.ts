/**
 * @asyncloop/event-loop
 *
 * Deterministic scheduling engine for testing asynchronous code.
 *
 * Provides:
 * - EventLoop: scheduled calls with jitter, ordered scheduling, done items
 *   with deadlines and required resolution order, one completion state
 * - ScheduledCallQueue: time-ordered, insertion-stable call queue
 * - DoneRegistry and CompletionStateMachine building blocks
 * - LoopLock: parked-window exclusion for foreign async contexts
 * - Console logger and OpenTelemetry span/metrics helpers
 */

// Clock
export { defaultClock } from "./clock.js";
// Completion
export { CompletionStateMachine } from "./completion.js";
// Config
export {
  doneSpecFromOptions,
  resolveDoneSpec,
  resolveEventLoopConfig,
  resolveLogLevel,
} from "./config.js";
// Constants
export {
  DEFAULT_DONE_TAG,
  DEFAULT_DONE_TIMEOUT_MS,
  DEFAULT_JITTER_PCT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_SCHED_DELAY_MS,
  GUARD_SKEW_WARN_MS,
  LOG_LEVEL_ENV,
  PACKAGE_NAME,
  WAKEUP_TOLERANCE_MS,
} from "./constants.js";
// Done registry
export { DoneRegistry, type ResolvedDoneSpec } from "./done-registry.js";
// Event loop
export { createEventLoop, EventLoop } from "./event-loop.js";
// Jitter
export { jitteredFireTime, jitterOffset, jitterWindow } from "./jitter.js";
// Lock
export { LoopLock } from "./lock.js";
// Logging
export { createConsoleLogger, isLogLevel, parseLogLevel, silentLogger } from "./logger.js";
// Queue
export { ScheduledCallQueue } from "./sched-queue.js";
// Telemetry
export { getLoopCompletions, getLoopDuration, recordLoopCompletion, withSpan } from "./telemetry.js";
// Types
export type {
  CallHandle,
  Clock,
  CompletionState,
  DoneItem,
  DoneOptions,
  DoneSnapshot,
  DoneSpec,
  DoneStatus,
  EventLoopConfig,
  LogLevel,
  LoopLogger,
  LoopResult,
  ResolvedEventLoopConfig,
  ScheduledAction,
  ScheduledCall,
} from "./types.js";
