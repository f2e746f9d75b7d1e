/**
 * Default clock implementation.
 *
 * Monotonic time from performance.now(), sleeping through globalThis timers.
 * Tests inject a manual clock for deterministic behavior.
 */

import type { Clock } from "./types.js";

export const defaultClock: Clock = {
  now: () => Math.floor(performance.now()),
  sleep: (ms) =>
    new Promise<void>((resolve) => {
      globalThis.setTimeout(resolve, ms);
    }),
};
