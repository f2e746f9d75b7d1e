/**
 * Exclusive lock over the loop's mutable state.
 *
 * The running loop owns the lock except while it is parked in its sleep
 * step. Foreign contexts (real timers, I/O callbacks, worker messages) go
 * through `runExclusive()` and are served FIFO, each inside one parked
 * window. Release hands the lock straight to the next waiter, so the loop
 * cannot slip back in between two queued foreign calls.
 */

import { InternalError } from "@asyncloop/errors";

export class LoopLock {
  private _locked = false;
  private readonly waiters: Array<() => void> = [];

  get locked(): boolean {
    return this._locked;
  }

  /** Callers blocked in acquire() */
  get waiting(): number {
    return this.waiters.length;
  }

  acquire(): Promise<void> {
    if (!this._locked) {
      this._locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * @throws {InternalError} when the lock is not held
   */
  release(): void {
    if (!this._locked) {
      throw new InternalError("LoopLock released while not held");
    }
    const next = this.waiters.shift();
    if (next === undefined) {
      this._locked = false;
      return;
    }
    next();
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
