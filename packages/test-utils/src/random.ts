/**
 * Random sources with known output, for jitter tests.
 */

/**
 * Returns the given values in order, starting over after the last one.
 * @throws {RangeError} for an empty list or values outside [0, 1)
 */
export function scriptedRandom(values: readonly number[]): () => number {
  if (values.length === 0) {
    throw new RangeError("scriptedRandom needs at least one value");
  }
  for (const value of values) {
    if (value < 0 || value >= 1) {
      throw new RangeError(`random values must be in [0, 1), got ${value}`);
    }
  }
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index++;
    return value;
  };
}

/** Always returns the same value */
export function constantRandom(value: number): () => number {
  return scriptedRandom([value]);
}
