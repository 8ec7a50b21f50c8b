/**
 * Reference trailing-window extrema by full rescan. O(n * window).
 */
export interface ReferenceExtrema {
  min: number[];
  max: number[];
}

export function bruteForceExtrema(signal: readonly number[], window: number): ReferenceExtrema {
  const min: number[] = [];
  const max: number[] = [];

  for (let t = 0; t < signal.length; t++) {
    let lo = Infinity;
    let hi = -Infinity;
    for (let i = Math.max(0, t - window + 1); i <= t; i++) {
      const value = signal[i] ?? NaN;
      if (value < lo) lo = value;
      if (value > hi) hi = value;
    }
    min.push(lo);
    max.push(hi);
  }

  return { min, max };
}

/**
 * Array-backed view for search tests.
 */
export function arrayView(values: readonly number[]): { length: number; at(index: number): number } {
  return {
    length: values.length,
    at: (index: number) => {
      const value = values[index];
      if (value === undefined) {
        throw new RangeError(`Index ${index} out of range`);
      }
      return value;
    },
  };
}
