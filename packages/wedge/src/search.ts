/**
 * Dominance boundary search for monotonic wedges.
 *
 * Gallops backward from the newest entry with strides 1, 2, 4, 8, ...
 * until it probes an entry the new value does not dominate (or passes the
 * front), then binary-searches the bracket it has isolated. A call that
 * evicts `r` entries costs O(log r + 1) comparisons; any call costs at
 * most O(log n).
 */

import type { Compare } from '@monowedge/contracts';

/**
 * Read-only random access over stored values, index 0 being the oldest.
 */
export interface IndexedView<T> {
  readonly length: number;
  at(index: number): T;
}

export interface SearchResult {
  /** First index to evict; equals `length` when nothing is dominated */
  index: number;
  /** Comparator evaluations spent */
  probes: number;
}

/**
 * Finds where the dominated suffix of a wedge starts.
 *
 * Entries `[0, index)` satisfy `compare(entry, value)` and are kept.
 * Entries `[index, length)` do not (this includes ties) and are evicted.
 * The view must already be monotonic under `compare`.
 *
 * @example
 * ```typescript
 * const view = { length: 4, at: (i: number) => [9, 7, 4, 2][i] ?? 0 };
 * wedgeSearch(view, 5, greater); // { index: 2, probes: 4 }
 * ```
 */
export function wedgeSearch<T>(view: IndexedView<T>, value: T, compare: Compare<T>): SearchResult {
  const length = view.length;
  let probes = 0;

  // Galloping phase: [lo, hi) brackets the boundary once it stops.
  let lo = 0;
  let hi = length;
  let stride = 1;

  while (length - stride >= 0) {
    const probe = length - stride;
    probes++;
    if (compare(view.at(probe), value)) {
      lo = probe + 1;
      break;
    }
    hi = probe;
    stride *= 2;
  }

  // Binary phase: first index in [lo, hi) that is not kept.
  while (lo < hi) {
    const mid = lo + ((hi - lo) >>> 1);
    probes++;
    if (compare(view.at(mid), value)) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  return { index: lo, probes };
}
