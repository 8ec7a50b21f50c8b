/**
 * Wedge construction.
 *
 * The key domain picks the representation; callers only ever see the
 * `MonoWedge` contract.
 */

import type { KeyDomain, MonoWedge, WedgeDirection } from '@monowedge/contracts';
import type { BaseWedgeOptions } from './base-wedge.js';
import { directionCompare, greater, less, type Scalar } from './comparators.js';
import { RingWedge } from './ring-wedge.js';
import { TreeWedge } from './tree-wedge.js';

export interface WedgeOptions<K, V> extends BaseWedgeOptions<K, V> {
  /**
   * Expected key density.
   * - 'dense': ring buffer, O(1) amortized update
   * - 'sparse': balanced tree, O(log n) update
   * @default 'dense'
   */
  keys?: KeyDomain;

  /** Initial ring capacity; ignored for sparse keys */
  initialCapacity?: number;
}

export type ScalarWedgeOptions<K, V> = Omit<WedgeOptions<K, V>, 'compare'>;

/**
 * Creates an empty wedge.
 *
 * @example
 * ```typescript
 * const wedge = createWedge<number, number>({ compare: greater });
 * wedge.update(0, 3);
 * wedge.update(1, 1);
 * wedge.front(); // { key: 0, value: 3 }
 * ```
 *
 * @example
 * ```typescript
 * // Irregular timestamps with a custom value order
 * const wedge = createWedge<Date, Reading>({
 *   keys: 'sparse',
 *   compare: compareBy((r: Reading) => r.celsius, less),
 * });
 * ```
 */
export function createWedge<K, V>(options: WedgeOptions<K, V>): MonoWedge<K, V> {
  const { keys = 'dense', initialCapacity, ...base } = options;

  if (keys === 'sparse') {
    return new TreeWedge<K, V>(base);
  }
  return new RingWedge<K, V>({ ...base, initialCapacity });
}

/**
 * Wedge whose front is the minimum of the retained values.
 */
export function minWedge<V extends Scalar, K = number>(
  options: ScalarWedgeOptions<K, V> = {}
): MonoWedge<K, V> {
  return createWedge<K, V>({ ...options, compare: less });
}

/**
 * Wedge whose front is the maximum of the retained values.
 */
export function maxWedge<V extends Scalar, K = number>(
  options: ScalarWedgeOptions<K, V> = {}
): MonoWedge<K, V> {
  return createWedge<K, V>({ ...options, compare: greater });
}

export function directionWedge<V extends Scalar, K = number>(
  direction: WedgeDirection,
  options: ScalarWedgeOptions<K, V> = {}
): MonoWedge<K, V> {
  return createWedge<K, V>({ ...options, compare: directionCompare<V>(direction) });
}
