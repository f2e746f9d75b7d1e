/**
 * Time-ordered queue of scheduled calls.
 *
 * Entries are kept sorted by `(fireTimeMs, seq)`; `seq` grows with every
 * insert, so equal fire times keep insertion order. Handles carry both keys,
 * which lets `remove()` find an entry by binary search and makes a stale
 * handle a harmless miss.
 */

import type { CallHandle, ScheduledAction, ScheduledCall } from "./types.js";

function compareKeys(a: CallHandle, b: CallHandle): number {
  return a.fireTimeMs - b.fireTimeMs || a.seq - b.seq;
}

/**
 * Binary search for the first entry whose key is not less than `key`.
 */
function lowerBound(entries: readonly ScheduledCall[], key: CallHandle): number {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const midEntry = entries[mid];
    if (midEntry !== undefined && compareKeys(midEntry, key) < 0) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

export class ScheduledCallQueue {
  private readonly entries: ScheduledCall[] = [];
  private nextSeq = 0;

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  insert(fireTimeMs: number, action: ScheduledAction): CallHandle {
    const entry: ScheduledCall = { fireTimeMs, seq: this.nextSeq++, action };
    // The new seq is the largest so far: the entry lands after every equal fire time
    this.entries.splice(lowerBound(this.entries, entry), 0, entry);
    return { fireTimeMs: entry.fireTimeMs, seq: entry.seq };
  }

  peekEarliest(): ScheduledCall | undefined {
    return this.entries[0];
  }

  /** Dequeue the earliest entry */
  shift(): ScheduledCall | undefined {
    return this.entries.shift();
  }

  /**
   * Remove the entry a handle refers to.
   * Returns false when it already fired or was removed.
   */
  remove(handle: CallHandle): boolean {
    const idx = lowerBound(this.entries, handle);
    const found = this.entries[idx];
    if (found === undefined || found.seq !== handle.seq) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  has(handle: CallHandle): boolean {
    const found = this.entries[lowerBound(this.entries, handle)];
    return found !== undefined && found.seq === handle.seq;
  }
}
