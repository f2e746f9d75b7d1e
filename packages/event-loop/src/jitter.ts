/**
 * Jitter injection for scheduled fire times.
 */

/**
 * Half-width of the jitter window, in whole milliseconds.
 * `jitterPct = 0` gives a zero window.
 */
export function jitterWindow(delayMs: number, jitterPct: number): number {
  return Math.trunc((Math.abs(delayMs) * jitterPct) / 100);
}

/**
 * Uniformly random integer in `[-window, +window)`, or 0 for an empty window.
 */
export function jitterOffset(window: number, random: () => number): number {
  if (window <= 0) return 0;
  const span = 2 * window;
  // Clamp so a source returning exactly 1 still lands inside the window
  const step = Math.min(span - 1, Math.floor(random() * span));
  return step - window;
}

/** Nominal fire time perturbed by jitter */
export function jitteredFireTime(
  anchorMs: number,
  delayMs: number,
  jitterPct: number,
  random: () => number,
): number {
  const magnitude = Math.abs(delayMs);
  return anchorMs + magnitude + jitterOffset(jitterWindow(magnitude, jitterPct), random);
}
