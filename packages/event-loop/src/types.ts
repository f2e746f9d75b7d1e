import type { AsyncLoopError } from "@asyncloop/errors";

/** Clock abstraction, injectable for deterministic testing */
export interface Clock {
  /** Monotonic milliseconds */
  readonly now: () => number;
  readonly sleep: (ms: number) => Promise<void>;
}

/** A scheduled callback. A returned promise is awaited before the loop moves on. */
export type ScheduledAction = () => void | Promise<void>;

/**
 * Reference to an entry of the scheduled-call queue.
 * Stays valid (as a no-op target) after the entry fired or was removed.
 */
export interface CallHandle {
  readonly seq: number;
  readonly fireTimeMs: number;
}

export interface ScheduledCall extends CallHandle {
  readonly action: ScheduledAction;
}

export type CompletionState = "not_complete" | "success" | "error" | "aborted";

export type DoneStatus = "not_complete" | "success" | "error";

/** Typed registration record for a done item */
export interface DoneSpec {
  readonly tag: string;
  /** Overrides the loop's default per-item timeout */
  readonly timeoutMs?: number;
  /** 1-based required resolution rank; 0 or absent means unordered */
  readonly orderRank?: number;
}

/** Short option names accepted by `addDone(tag, options)` */
export interface DoneOptions {
  readonly timeout?: number;
  /** Alias of `timeout` */
  readonly tmo?: number;
  readonly order?: number;
}

export interface DoneItem {
  readonly tag: string;
  status: DoneStatus;
  readonly timeoutMs: number;
  /** Absolute, set when the loop starts running */
  deadlineMs: number | undefined;
  readonly orderRank: number;
  guard: CallHandle | undefined;
}

export interface DoneSnapshot {
  readonly tag: string;
  readonly status: DoneStatus;
  readonly timeoutMs: number;
  readonly deadlineMs: number | undefined;
  readonly orderRank: number;
}

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LoopLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Event loop configuration */
export interface EventLoopConfig {
  /** Done items to register. When omitted, the `_default` item is registered instead. */
  readonly dones?: readonly DoneSpec[];
  /** Per-item timeout in ms (default: 2000) */
  readonly defaultTimeoutMs?: number;
  /** Jitter window as a percentage of the nominal delay (default: 50) */
  readonly jitterPct?: number;
  /** Clock abstraction (default: performance.now + setTimeout) */
  readonly clock?: Clock;
  /** RNG for jitter (default: Math.random) */
  readonly random?: () => number;
  /** Log sink (default: console, filtered by logLevel) */
  readonly logger?: LoopLogger;
  /** Console log level (default: ASYNCLOOP_LOG_LEVEL or "warn"); ignored with a custom logger */
  readonly logLevel?: LogLevel;
}

/** Fully resolved config (no optionals) */
export interface ResolvedEventLoopConfig {
  readonly dones: readonly DoneSpec[] | undefined;
  readonly defaultTimeoutMs: number;
  readonly jitterPct: number;
  readonly clock: Clock;
  readonly random: () => number;
  readonly logger: LoopLogger;
}

/** What the loop exposes once it stops */
export interface LoopResult {
  readonly state: CompletionState;
  /** Empty on success */
  readonly errorMsg: string;
  /** The done item that failed, if the failure was tied to one */
  readonly errorTag: string | undefined;
  readonly error: AsyncLoopError | undefined;
  /** Number of ranked done items resolved in order */
  readonly orderCounter: number;
  readonly elapsedMs: number;
  readonly dones: readonly DoneSnapshot[];
}
