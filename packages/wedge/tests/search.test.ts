import { describe, it, expect } from 'vitest';
import { seededRandom } from '@monowedge/signals';
import { wedgeSearch, greater, less } from '../src/index.js';
import { arrayView } from './helpers/brute-force.js';

describe('wedgeSearch', () => {
  it('should return index 0 without probing an empty view', () => {
    expect(wedgeSearch(arrayView([]), 5, greater)).toEqual({ index: 0, probes: 0 });
  });

  it('should locate the dominated suffix of a max wedge', () => {
    expect(wedgeSearch(arrayView([9, 7, 4, 2]), 5, greater)).toEqual({ index: 2, probes: 4 });
  });

  it('should stop after one probe when nothing is dominated', () => {
    expect(wedgeSearch(arrayView([9, 7, 4, 2]), 1, greater)).toEqual({ index: 4, probes: 1 });
  });

  it('should evict everything when the value dominates the front', () => {
    expect(wedgeSearch(arrayView([9, 7, 4, 2]), 10, greater)).toEqual({ index: 0, probes: 3 });
  });

  it('should evict ties', () => {
    expect(wedgeSearch(arrayView([9, 7, 4, 2]), 4, greater)).toEqual({ index: 2, probes: 4 });
    expect(wedgeSearch(arrayView([1, 3, 5, 8]), 5, less)).toEqual({ index: 2, probes: 4 });
  });

  it('should stay logarithmic in the number of evicted entries', () => {
    const descending = Array.from({ length: 1024 }, (_, i) => 1023 - i);
    const view = arrayView(descending);

    expect(wedgeSearch(view, 0.5, greater)).toEqual({ index: 1023, probes: 2 });
    expect(wedgeSearch(view, 2000, greater)).toEqual({ index: 0, probes: 11 });
  });

  it('should agree with a linear scan on random monotonic views', () => {
    const random = seededRandom(11);

    for (let round = 0; round < 200; round++) {
      const length = Math.floor(random() * 64);
      const values: number[] = [];
      let current = 0;
      for (let i = 0; i < length; i++) {
        current += 1 + Math.floor(random() * 3);
        values.push(current);
      }
      const probe = Math.floor(random() * (current + 3));

      let expected = 0;
      while (expected < values.length && (values[expected] ?? Infinity) < probe) {
        expected++;
      }

      expect(wedgeSearch(arrayView(values), probe, less).index).toBe(expected);
    }
  });
});
