/**
 * @fileoverview Monotonic wedge contract types.
 *
 * A wedge stores `(key, value)` entries in ascending key order such that,
 * read front to back, each value is strictly more extreme than every later
 * value under the configured order. The front is therefore always the
 * extremum of everything still retained.
 *
 * @module @monowedge/contracts/wedge
 */

/**
 * Strict total order: returns true when `a` is strictly more extreme than `b`.
 *
 * A "less" order yields a min-wedge, a "greater" order a max-wedge.
 * Must be irreflexive (`compare(x, x) === false`).
 */
export type Compare<T> = (a: T, b: T) => boolean;

/**
 * Which extremum a wedge tracks.
 */
export type WedgeDirection = 'min' | 'max';

/**
 * Expected key density, used to pick the internal representation.
 *
 * - 'dense': arrival counters or regularly sampled timestamps (ring buffer)
 * - 'sparse': irregular explicit timestamps (balanced ordered tree)
 */
export type KeyDomain = 'dense' | 'sparse';

/**
 * A stored entry. Entries handed out by a wedge are frozen.
 */
export interface WedgeEntry<K, V> {
  readonly key: K;
  readonly value: V;
}

/**
 * Cumulative operation counters for a wedge instance.
 *
 * Every entry is inserted once and removed at most once, so
 * `evicted + popped <= inserted` always holds.
 */
export interface WedgeStats {
  /** Entries appended by update() */
  inserted: number;
  /** Entries removed as a dominated suffix during update() */
  evicted: number;
  /** Entries removed by popFront() */
  popped: number;
  /** Comparator evaluations spent locating dominance boundaries */
  probes: number;
}

/**
 * Monotonic wedge contract shared by every representation.
 *
 * Not thread-safe. Any mutating call (`update`, `popFront`, `clear`)
 * invalidates iterators obtained earlier; advancing one afterwards throws
 * `ConcurrentModificationError`.
 */
export interface MonoWedge<K, V> extends Iterable<WedgeEntry<K, V>> {
  /**
   * Evicts every trailing entry that is not strictly more extreme than
   * `value` (ties included), then appends `(key, value)`.
   *
   * @throws KeyOrderError when key ordering is checked and `key` is not
   *   strictly greater than the newest stored key
   */
  update(key: K, value: V): void;

  /**
   * The oldest retained entry, which is the current extremum.
   *
   * @throws EmptyWedgeError when the wedge is empty
   */
  front(): WedgeEntry<K, V>;

  /** Like front(), but returns undefined on an empty wedge. */
  peekFront(): WedgeEntry<K, V> | undefined;

  /**
   * Removes and returns the oldest entry.
   *
   * @throws EmptyWedgeError when the wedge is empty
   */
  popFront(): WedgeEntry<K, V>;

  /**
   * The extremum over all retained entries with `key >= fromKey`,
   * or undefined if there are none.
   */
  extremumSince(fromKey: K): WedgeEntry<K, V> | undefined;

  /** Lazy iteration in ascending key order. */
  entries(): IterableIterator<WedgeEntry<K, V>>;

  size(): number;

  isEmpty(): boolean;

  /** Removes every entry. Counters are kept. */
  clear(): void;

  /** Snapshot of the cumulative counters. */
  stats(): WedgeStats;
}
