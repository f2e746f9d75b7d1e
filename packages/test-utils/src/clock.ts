import type { Clock } from "@asyncloop/event-loop";

/**
 * Virtual-time clock for deterministic loop tests.
 *
 * `sleep(ms)` moves virtual time forward at once and resolves on the next
 * macrotask, so other async code gets a turn while the loop is parked.
 * Time otherwise moves only through `advance()`.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock();
 * const loop = new EventLoop({ clock, jitterPct: 0 });
 * loop.schedCall(() => loop.done(), 100);
 * await loop.run();
 * expect(clock.now()).toBe(100);
 * ```
 */
export class ManualClock implements Clock {
  private _now: number;
  private readonly _sleeps: number[] = [];
  private readonly earlyWakeups: number[] = [];
  private readonly sleepHooks: Array<() => void> = [];

  constructor(startMs = 0) {
    this._now = startMs;
  }

  readonly now = (): number => this._now;

  readonly sleep = (ms: number): Promise<void> => {
    this._sleeps.push(ms);
    const early = this.earlyWakeups.shift() ?? 0;
    this._now += Math.max(0, ms - early);
    const hook = this.sleepHooks.shift();
    hook?.();
    return new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
  };

  /** Every duration passed to sleep(), in order */
  get sleeps(): readonly number[] {
    return this._sleeps;
  }

  advance(ms: number): void {
    this._now += ms;
  }

  /** Make the next sleep return `byMs` before the requested time */
  wakeEarly(byMs: number): void {
    this.earlyWakeups.push(byMs);
  }

  /**
   * Run `fn` inside the next sleep, after time has moved and before the
   * sleeper resumes, i.e. while the loop is parked.
   */
  duringNextSleep(fn: () => void): void {
    this.sleepHooks.push(fn);
  }
}
