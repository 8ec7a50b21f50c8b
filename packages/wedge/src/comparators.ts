/**
 * Strict orders for wedge values and keys.
 *
 * `less` and `greater` cover the scalar types a stream usually carries.
 * Anything else is ordered through `compareBy` (project to a scalar) or
 * `fromComparator` (adapt an existing three-way comparator).
 */

import type { Compare, WedgeDirection } from '@monowedge/contracts';

/**
 * Values `less` and `greater` can order directly. Dates order by epoch time.
 */
export type Scalar = number | bigint | string | Date;

function threeWay(a: Scalar, b: Scalar): number {
  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;

  if (typeof x === 'string' || typeof y === 'string') {
    if (typeof x !== 'string' || typeof y !== 'string') {
      throw new TypeError(`Cannot order ${typeof x} against ${typeof y}`);
    }
    return x < y ? -1 : x > y ? 1 : 0;
  }

  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Ascending order. Produces a min-wedge.
 *
 * @example
 * ```typescript
 * less(1, 2); // true
 * less(2, 2); // false
 * ```
 */
export function less<T extends Scalar>(a: T, b: T): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b;
  }
  return threeWay(a, b) < 0;
}

/**
 * Descending order. Produces a max-wedge.
 */
export function greater<T extends Scalar>(a: T, b: T): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    return a > b;
  }
  return threeWay(a, b) > 0;
}

/**
 * Orders values by a projected scalar.
 *
 * @example
 * ```typescript
 * interface Sample { time: number; level: number }
 * const byLevel = compareBy((s: Sample) => s.level, greater);
 * ```
 */
export function compareBy<T, P>(project: (value: T) => P, order: Compare<P>): Compare<T> {
  return (a, b) => order(project(a), project(b));
}

/**
 * Flips an order: `reverse(less)` behaves like `greater`.
 */
export function reverse<T>(order: Compare<T>): Compare<T> {
  return (a, b) => order(b, a);
}

/**
 * Adapts a three-way comparator (`Array.prototype.sort` style) to a
 * strict order. Negative results mean `a` sorts first and counts as more
 * extreme, so `fromComparator((a, b) => a - b)` is a min order.
 */
export function fromComparator<T>(comparator: (a: T, b: T) => number): Compare<T> {
  return (a, b) => comparator(a, b) < 0;
}

function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    value instanceof Date
  );
}

/**
 * Default key order: ascending over scalar keys.
 *
 * @throws TypeError for keys that are not scalars; pass an explicit
 *   `keyCompare` for those
 */
export const naturalKeyOrder: Compare<unknown> = (a, b) => {
  if (!isScalar(a) || !isScalar(b)) {
    throw new TypeError('Keys are not scalars; supply a keyCompare to order them');
  }
  return less(a, b);
};

/**
 * The built-in order for a wedge direction.
 */
export function directionCompare<T extends Scalar>(direction: WedgeDirection): Compare<T> {
  return direction === 'min' ? less : greater;
}
