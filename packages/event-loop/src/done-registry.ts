/**
 * Registry of done items keyed by their unique tag, plus the running
 * counter that enforces resolution order for ranked items.
 */

import { DoneOrderError, LoopUsageError } from "@asyncloop/errors";
import type { DoneItem, DoneSnapshot } from "./types.js";

/** Registration input with every default already applied */
export interface ResolvedDoneSpec {
  readonly tag: string;
  readonly timeoutMs: number;
  readonly orderRank: number;
}

export class DoneRegistry {
  private readonly items = new Map<string, DoneItem>();
  private _orderCounter = 0;

  get size(): number {
    return this.items.size;
  }

  /** Ranked items resolved in order so far */
  get orderCounter(): number {
    return this._orderCounter;
  }

  /**
   * @throws {LoopUsageError} when the tag is already registered
   */
  add(spec: ResolvedDoneSpec): DoneItem {
    if (this.items.has(spec.tag)) {
      throw new LoopUsageError(`addDone: Duplicate done() tag '${spec.tag}'`);
    }
    const item: DoneItem = {
      tag: spec.tag,
      status: "not_complete",
      timeoutMs: spec.timeoutMs,
      deadlineMs: undefined,
      orderRank: spec.orderRank,
      guard: undefined,
    };
    this.items.set(spec.tag, item);
    return item;
  }

  has(tag: string): boolean {
    return this.items.has(tag);
  }

  get(tag: string): DoneItem | undefined {
    return this.items.get(tag);
  }

  /**
   * @throws {LoopUsageError} when the tag is unknown
   */
  require(tag: string): DoneItem {
    const item = this.items.get(tag);
    if (item === undefined) {
      throw new LoopUsageError(`Unknown done() tag '${tag}'`);
    }
    return item;
  }

  values(): IterableIterator<DoneItem> {
    return this.items.values();
  }

  /**
   * Check a resolving item against the order counter.
   *
   * Unranked items always pass and leave the counter alone. A ranked item
   * must carry the next rank; on a match the counter advances, on a
   * mismatch the returned error names both ranks and the counter stays put.
   */
  checkOrder(item: DoneItem): DoneOrderError | undefined {
    if (item.orderRank === 0) return undefined;
    const expected = this._orderCounter + 1;
    if (item.orderRank !== expected) {
      return new DoneOrderError(item.tag, expected, item.orderRank);
    }
    this._orderCounter = expected;
    return undefined;
  }

  snapshot(): readonly DoneSnapshot[] {
    return Object.freeze(
      [...this.items.values()].map((item) => ({
        tag: item.tag,
        status: item.status,
        timeoutMs: item.timeoutMs,
        deadlineMs: item.deadlineMs,
        orderRank: item.orderRank,
      })),
    );
  }
}
