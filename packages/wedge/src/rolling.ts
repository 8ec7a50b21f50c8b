/**
 * Trailing-window extrema driven by a wedge.
 *
 * The wedge itself never ages entries out. These helpers apply the usual
 * policy on top of it: after each update, pop the front while
 * `front.key <= latestKey - window`, then read the front.
 */

import {
  WindowConfigError,
  type Compare,
  type KeyDomain,
  type MonoWedge,
  type WedgeEntry,
} from '@monowedge/contracts';
import { greater, less, reverse, type Scalar } from './comparators.js';
import { createWedge } from './factory.js';

export interface RollingOptions<V> {
  /** Strict order over values; the window tracks its most extreme value */
  compare: Compare<V>;
  /** Window width in key units (samples, milliseconds, ...). Must be > 0. */
  window: number;
  /** @default 'dense' */
  keys?: KeyDomain;
  /** @default true */
  checkKeyOrder?: boolean;
  /** Called for every entry aged out of the window */
  onExpire?: (entry: WedgeEntry<number, V>, latestKey: number) => void;
}

function assertWindow(window: number): void {
  if (!Number.isFinite(window) || window <= 0) {
    throw new WindowConfigError('Window must be a positive finite number', { window });
  }
}

/**
 * Extremum of the values whose keys fall in `(latestKey - window, latestKey]`.
 *
 * @example
 * ```typescript
 * const rolling = new RollingExtremum({ compare: greater, window: 3 });
 * [3, 1, 4, 1, 5, 9, 2, 6].map((v) => rolling.push(v).value);
 * // => [3, 3, 4, 4, 5, 9, 9, 9]
 * ```
 */
export class RollingExtremum<V> {
  readonly wedge: MonoWedge<number, V>;
  readonly window: number;
  private readonly onExpire?: (entry: WedgeEntry<number, V>, latestKey: number) => void;
  private nextKey: number = 0;

  constructor(options: RollingOptions<V>) {
    assertWindow(options.window);
    this.window = options.window;
    this.onExpire = options.onExpire;
    this.wedge = createWedge<number, V>({
      compare: options.compare,
      keyCompare: less,
      keys: options.keys,
      checkKeyOrder: options.checkKeyOrder,
    });
  }

  /**
   * Adds a value at the next arrival key (previous key + 1, starting at 0).
   */
  push(value: V): WedgeEntry<number, V> {
    return this.pushAt(this.nextKey, value);
  }

  /**
   * Adds a value at an explicit key and returns the window extremum.
   *
   * @throws WindowConfigError if key is not a finite number
   * @throws KeyOrderError if key does not increase
   */
  pushAt(key: number, value: V): WedgeEntry<number, V> {
    if (!Number.isFinite(key)) {
      throw new WindowConfigError('Rolling window keys must be finite numbers', { key });
    }

    this.wedge.update(key, value);
    this.nextKey = key + 1;

    const border = key - this.window;
    let oldest = this.wedge.front();
    while (oldest.key <= border) {
      this.wedge.popFront();
      this.onExpire?.(oldest, key);
      oldest = this.wedge.front();
    }

    return oldest;
  }

  /** Current extremum, or undefined before the first push. */
  current(): WedgeEntry<number, V> | undefined {
    return this.wedge.peekFront();
  }

  size(): number {
    return this.wedge.size();
  }

  reset(): void {
    this.wedge.clear();
    this.nextKey = 0;
  }
}

export interface RollingRangeOptions<V> extends Omit<RollingOptions<V>, 'compare' | 'onExpire'> {
  /** Ascending order over values */
  order: Compare<V>;
}

export interface RangeSnapshot<V> {
  min: WedgeEntry<number, V>;
  max: WedgeEntry<number, V>;
}

/**
 * Tracks the trailing minimum and maximum of one stream together.
 */
export class RollingRange<V> {
  readonly min: RollingExtremum<V>;
  readonly max: RollingExtremum<V>;

  constructor(options: RollingRangeOptions<V>) {
    const { order, ...rest } = options;
    this.min = new RollingExtremum<V>({ ...rest, compare: order });
    this.max = new RollingExtremum<V>({ ...rest, compare: reverse(order) });
  }

  push(value: V): RangeSnapshot<V> {
    return { min: this.min.push(value), max: this.max.push(value) };
  }

  pushAt(key: number, value: V): RangeSnapshot<V> {
    return { min: this.min.pushAt(key, value), max: this.max.pushAt(key, value) };
  }

  reset(): void {
    this.min.reset();
    this.max.reset();
  }
}

export function rollingMin<V extends Scalar>(
  window: number,
  options: Omit<RollingOptions<V>, 'compare' | 'window'> = {}
): RollingExtremum<V> {
  return new RollingExtremum<V>({ ...options, window, compare: less });
}

export function rollingMax<V extends Scalar>(
  window: number,
  options: Omit<RollingOptions<V>, 'compare' | 'window'> = {}
): RollingExtremum<V> {
  return new RollingExtremum<V>({ ...options, window, compare: greater });
}

export function rollingRange<V extends Scalar>(
  window: number,
  options: Omit<RollingRangeOptions<V>, 'order' | 'window'> = {}
): RollingRange<V> {
  return new RollingRange<V>({ ...options, window, order: less });
}
