/**
 * EventLoop: drives scheduled calls on a timeline and tracks done items.
 *
 * Before `run()`: register done items and schedule calls.
 * During `run()`: sleep until the earliest call is due, invoke it, repeat
 * until the queue drains or the completion state is set. Every done item
 * gets a timeout guard when the run starts.
 *
 * All scheduled actions run one at a time on the loop. Foreign async
 * contexts resolve items through `runExclusive()`, which waits for the
 * loop to park in its sleep step.
 */

import {
  AsyncLoopError,
  DoneAlreadyResolvedError,
  DoneFailedError,
  DoneResolutionError,
  DoneTimeoutError,
  LoopActionError,
  LoopInternalError,
  LoopUsageError,
} from "@asyncloop/errors";
import { CompletionStateMachine } from "./completion.js";
import { doneSpecFromOptions, resolveDoneSpec, resolveEventLoopConfig } from "./config.js";
import {
  DEFAULT_DONE_TAG,
  DEFAULT_SCHED_DELAY_MS,
  GUARD_SKEW_WARN_MS,
  WAKEUP_TOLERANCE_MS,
} from "./constants.js";
import { DoneRegistry } from "./done-registry.js";
import { jitteredFireTime } from "./jitter.js";
import { LoopLock } from "./lock.js";
import { ScheduledCallQueue } from "./sched-queue.js";
import { recordLoopCompletion, withSpan } from "./telemetry.js";
import type {
  CallHandle,
  Clock,
  CompletionState,
  DoneItem,
  DoneOptions,
  DoneSpec,
  EventLoopConfig,
  LoopLogger,
  LoopResult,
  ScheduledAction,
} from "./types.js";
import { delayMsSchema, jitterPctSchema, validateOrThrow } from "./validation.js";

export class EventLoop {
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly logger: LoopLogger;
  private readonly defaultTimeoutMs: number;

  private readonly queue = new ScheduledCallQueue();
  private readonly registry = new DoneRegistry();
  private readonly completion = new CompletionStateMachine();
  private readonly lock = new LoopLock();

  private _jitterPct: number;
  private _lastOrderedFireMs: number | undefined;
  private _nextWakeupMs = Number.POSITIVE_INFINITY;
  private _started = false;
  private _parked = false;
  private _startedAtMs: number | undefined;
  private _finishedAtMs: number | undefined;
  private _actionFailure: AsyncLoopError | undefined;

  constructor(config: EventLoopConfig = {}) {
    const resolved = resolveEventLoopConfig(config);
    this.clock = resolved.clock;
    this.random = resolved.random;
    this.logger = resolved.logger;
    this.defaultTimeoutMs = resolved.defaultTimeoutMs;
    this._jitterPct = resolved.jitterPct;

    if (resolved.dones === undefined) {
      this.registerDone({ tag: DEFAULT_DONE_TAG });
    } else {
      for (const spec of resolved.dones) {
        this.registerDone(spec);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // State accessors
  // ---------------------------------------------------------------------------

  /** Default jitter window, in percent of a call's nominal delay */
  get jitterPct(): number {
    return this._jitterPct;
  }

  set jitterPct(value: number) {
    this.guardUsage(() => validateOrThrow(jitterPctSchema, value, "Invalid jitterPct"));
    this._jitterPct = value;
  }

  get state(): CompletionState {
    return this.completion.state;
  }

  /** Composed message of the recorded error; empty while nothing failed */
  get errorMsg(): string {
    return this.completion.error?.message ?? "";
  }

  get errorTag(): string | undefined {
    const error = this.completion.error;
    return error instanceof DoneResolutionError ? error.tag : undefined;
  }

  get orderCounter(): number {
    return this.registry.orderCounter;
  }

  /** Earliest fire time known to the loop (diagnostics only) */
  get nextWakeupMs(): number | undefined {
    return Number.isFinite(this._nextWakeupMs) ? this._nextWakeupMs : undefined;
  }

  get pendingCalls(): number {
    return this.queue.size;
  }

  /** True while the loop sleeps with its lock released */
  get parked(): boolean {
    return this._parked;
  }

  isPending(handle: CallHandle): boolean {
    return this.queue.has(handle);
  }

  result(): LoopResult {
    const startedAt = this._startedAtMs;
    const endedAt = this._finishedAtMs ?? this.clock.now();
    return {
      state: this.completion.state,
      errorMsg: this.errorMsg,
      errorTag: this.errorTag,
      error: this.completion.error,
      orderCounter: this.registry.orderCounter,
      elapsedMs: startedAt === undefined ? 0 : endedAt - startedAt,
      dones: this.registry.snapshot(),
    };
  }

  // ---------------------------------------------------------------------------
  // Scheduling
  // ---------------------------------------------------------------------------

  /**
   * Schedule `action` to run after `delayMs`, perturbed by jitter.
   *
   * A negative delay schedules relative to the previous ordered call's
   * fire time instead of now (the first ordered call anchors at now).
   *
   * @throws {LoopUsageError} on a non-integer delay or jitter outside 0-100
   */
  schedCall(
    action: ScheduledAction,
    delayMs: number = DEFAULT_SCHED_DELAY_MS,
    jitterPct: number = this._jitterPct,
  ): CallHandle {
    this.guardUsage(() => {
      validateOrThrow(delayMsSchema, delayMs, "schedCall: invalid delay");
      validateOrThrow(jitterPctSchema, jitterPct, "schedCall: invalid jitterPct");
    });

    let fireTimeMs: number;
    if (delayMs < 0) {
      const anchor = this._lastOrderedFireMs ?? this.clock.now();
      fireTimeMs = jitteredFireTime(anchor, delayMs, jitterPct, this.random);
      this._lastOrderedFireMs = fireTimeMs;
    } else {
      fireTimeMs = jitteredFireTime(this.clock.now(), delayMs, jitterPct, this.random);
    }
    return this.insertCall(fireTimeMs, action);
  }

  /**
   * Remove a scheduled call. Stale handles are ignored.
   * @returns whether a pending call was removed
   */
  cancelCall(handle: CallHandle): boolean {
    return this.queue.remove(handle);
  }

  // ---------------------------------------------------------------------------
  // Done registration
  // ---------------------------------------------------------------------------

  /**
   * Register a done item. Must happen before `run()`.
   *
   * @throws {LoopUsageError} on a duplicate tag, invalid options, or a running loop
   */
  addDone(spec: DoneSpec): void;
  addDone(tag: string, options?: DoneOptions): void;
  addDone(specOrTag: DoneSpec | string, options?: DoneOptions): void {
    this.guardUsage(() => {
      if (this._started) {
        throw new LoopUsageError("addDone() must be called before run()");
      }
      const spec =
        typeof specOrTag === "string" ? doneSpecFromOptions(specOrTag, options) : specOrTag;
      this.registerDone(spec);
    });
  }

  // ---------------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------------

  /**
   * Resolve a done item successfully.
   *
   * Resolving twice or out of order records a DoneAlreadyResolvedError or
   * DoneOrderError and fails the loop without throwing; the run stops at its
   * next iteration boundary. Once the loop is complete this is a no-op.
   *
   * @throws {LoopUsageError} for an unknown tag (state untouched)
   */
  done(tag: string = DEFAULT_DONE_TAG): void {
    const item = this.guardUsage(() => this.registry.require(tag));

    if (this.completion.isTerminal) {
      this.logger.debug(
        `Ignoring done('${tag}'): loop already complete (${this.completion.state})`,
      );
      return;
    }

    if (item.status !== "not_complete") {
      this.raise(new DoneAlreadyResolvedError(tag), false);
      return;
    }

    this.cancelGuard(item);

    const orderError = this.registry.checkOrder(item);
    if (orderError !== undefined) {
      this.raise(orderError, false);
      return;
    }

    item.status = "success";
    this.logger.info(`done('${tag}') -> success`);
  }

  /**
   * Fail the loop. The single-argument form targets `_default` when it is
   * registered and records an untagged error otherwise.
   *
   * Throws the recorded DoneFailedError to unwind the caller. Once the loop
   * is complete this is a no-op; the first error stays in place.
   *
   * @throws {LoopUsageError} for an empty or unknown tag
   */
  error(message: string): void;
  error(tag: string, message: string): void;
  error(tagOrMessage: string, message?: string): void {
    if (message === undefined) {
      const tag = this.registry.has(DEFAULT_DONE_TAG) ? DEFAULT_DONE_TAG : undefined;
      this.raise(new DoneFailedError(tag, tagOrMessage), true);
      return;
    }

    const tag = tagOrMessage;
    this.guardUsage(() => {
      if (tag.length === 0) {
        throw new LoopUsageError("error() for a tagged done() item called, but the tag is empty");
      }
      if (!this.registry.has(tag)) {
        throw new LoopUsageError(`error() called with unknown tag: ${tag}`);
      }
    });
    this.raise(new DoneFailedError(tag, message), true);
  }

  /**
   * Stop the loop at the next iteration boundary. An in-flight action
   * still runs to completion. No-op once the loop is complete.
   */
  abort(): void {
    if (this.completion.abort()) {
      this.logger.info("Loop aborted");
    }
  }

  /**
   * Run `fn` with exclusive access to the loop's state.
   *
   * While the loop runs, this waits until it parks in its sleep step;
   * before and after a run it executes as soon as no other caller holds
   * the lock. Errors thrown by `fn` (e.g. from `done()`) reject the promise
   * and, when they set the completion state, also end the run.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(fn);
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  /**
   * Arm every done item's guard and drain the queue in time order.
   *
   * @returns the result when the loop succeeded or was aborted
   * @throws {LoopUsageError} when nothing was scheduled or the loop already ran
   * @throws the recorded error when the loop ends in the `error` state
   */
  async run(): Promise<LoopResult> {
    this.guardUsage(() => {
      if (this._started) {
        throw new LoopUsageError("run() may only be called once per loop");
      }
      if (this.queue.isEmpty()) {
        throw new LoopUsageError(
          "Nothing to run: not even a single function call has been scheduled",
        );
      }
    });
    this._started = true;

    return withSpan(
      "asyncloop.loop.run",
      { "asyncloop.done_count": this.registry.size, "asyncloop.call_count": this.queue.size },
      async (span) => {
        await this.lock.acquire();
        try {
          this.armGuards();
          await this.loop();
        } finally {
          this._finishedAtMs = this.clock.now();
          this.lock.release();
        }

        const result = this.result();
        span.setAttribute("asyncloop.state", result.state);
        recordLoopCompletion(result.state, result.elapsedMs);

        const failure = this.completion.error ?? this._actionFailure;
        if (failure !== undefined) {
          throw failure;
        }
        return result;
      },
    );
  }

  /** Arm timeout guards: deadlines become absolute from the run's start */
  private armGuards(): void {
    const now = this.clock.now();
    this._startedAtMs = now;
    for (const item of this.registry.values()) {
      item.deadlineMs = now + item.timeoutMs;
      const tag = item.tag;
      item.guard = this.insertCall(item.deadlineMs, () => {
        this.onGuardFired(tag);
      });
    }
  }

  private async loop(): Promise<void> {
    while (!this.queue.isEmpty() && !this.completion.isTerminal) {
      this.logger.debug(`Pending events: ${this.queue.size}`);
      let head = this.queue.peekEarliest();
      if (head === undefined) break;
      this._nextWakeupMs = head.fireTimeMs;

      const sleepMs = head.fireTimeMs - this.clock.now();
      if (sleepMs > 0) {
        await this.park(sleepMs);
        // Foreign callers may have changed the state or the queue while parked
        if (this.completion.isTerminal) break;
        head = this.queue.peekEarliest();
        if (head === undefined) break;
        if (head.fireTimeMs - this.clock.now() > WAKEUP_TOLERANCE_MS) {
          this.logger.debug("Woke up before next event time, will sleep again");
          continue;
        }
      } else {
        this.logger.debug(`Negative or zero time to next event: ${sleepMs}`);
      }

      const call = this.queue.shift();
      if (call === undefined) break;
      try {
        await call.action();
      } catch (error) {
        this.recordActionFailure(error);
        break;
      }
    }

    if (this.completion.succeed()) {
      this.logger.debug("Schedule queue drained, loop complete");
    }
  }

  private async park(ms: number): Promise<void> {
    this.logger.debug(`Sleeping ${ms} ms before next event`);
    this._parked = true;
    this.lock.release();
    try {
      await this.clock.sleep(ms);
    } finally {
      await this.lock.acquire();
      this._parked = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private registerDone(spec: DoneSpec): DoneItem {
    return this.registry.add(resolveDoneSpec(spec, this.defaultTimeoutMs));
  }

  private insertCall(fireTimeMs: number, action: ScheduledAction): CallHandle {
    const handle = this.queue.insert(fireTimeMs, action);
    if (fireTimeMs < this._nextWakeupMs) {
      this._nextWakeupMs = fireTimeMs;
      this.logger.debug(`Setting next event after ${fireTimeMs - this.clock.now()} ms`);
    }
    return handle;
  }

  private cancelGuard(item: DoneItem): void {
    if (item.guard !== undefined) {
      this.queue.remove(item.guard);
      item.guard = undefined;
    }
  }

  private onGuardFired(tag: string): void {
    const item = this.registry.get(tag);
    if (item === undefined) {
      this.raise(
        new LoopInternalError(tag, `done() timeout handler could not find done item '${tag}'`),
        false,
      );
      return;
    }
    item.guard = undefined;

    const now = this.clock.now();
    if (item.deadlineMs !== undefined) {
      this.logger.debug(
        `done('${tag}') timeout handler executed with ${item.deadlineMs - now} ms offset from ideal`,
      );
      const skew = Math.abs(item.deadlineMs - now);
      if (skew > GUARD_SKEW_WARN_MS) {
        this.logger.warn(
          `done('${tag}') timeout handler executed with time offset of ${skew} ms ` +
            `(>${GUARD_SKEW_WARN_MS}ms) from required. NOTE: This is normal if paused in a debugger`,
        );
      }
    }

    if (item.status !== "not_complete") {
      this.logger.debug(`done('${tag}') timeout handler: done is resolved`);
      return;
    }
    this.raise(new DoneTimeoutError(tag, item.timeoutMs), false);
  }

  /**
   * Record a resolution failure: mark the item, set the completion state,
   * and optionally throw to unwind the caller. No-op once the loop is
   * complete.
   */
  private raise(error: DoneResolutionError, shouldThrow: boolean): void {
    if (this.completion.isTerminal) {
      this.logger.debug(
        `Ignoring "${error.message}": loop already complete (${this.completion.state})`,
      );
      return;
    }

    if (error.tag !== undefined) {
      const item = this.registry.get(error.tag);
      if (item !== undefined) {
        item.status = "error";
        this.cancelGuard(item);
      }
    }
    this.completion.fail(error);
    this.logger.error(error.message);

    if (shouldThrow) {
      throw error;
    }
  }

  /**
   * Handle an error that escaped a scheduled action.
   * Errors the loop already recorded end the run as they are; anything else
   * fails the loop (usage errors as themselves, foreign errors wrapped).
   */
  private recordActionFailure(error: unknown): void {
    if (error === this.completion.error) return;

    const failure = error instanceof AsyncLoopError ? error : new LoopActionError(error);
    if (!this.completion.fail(failure)) {
      // Already aborted or failed: keep the first outcome, still surface this throw
      this._actionFailure = failure;
    }
    this.logger.error(failure.message);
  }

  /** Log usage errors before they propagate */
  private guardUsage<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof LoopUsageError) {
        this.logger.error(error.message);
      }
      throw error;
    }
  }
}

/**
 * Create a loop expecting the given done items.
 * Without items the loop expects the single `_default` item.
 */
export function createEventLoop(dones?: readonly DoneSpec[], defaultTimeoutMs?: number): EventLoop {
  return new EventLoop({
    ...(dones !== undefined ? { dones } : {}),
    ...(defaultTimeoutMs !== undefined ? { defaultTimeoutMs } : {}),
  });
}
