/**
 * Seeded random number generator for deterministic signals.
 *
 * Linear congruential generator (Numerical Recipes constants). Returns
 * values in [0, 1).
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}
