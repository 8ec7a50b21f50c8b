/**
 * @fileoverview Main entry point for @monowedge/wedge package.
 *
 * Monotonic wedges for running minimum and maximum over sliding windows.
 *
 * @module @monowedge/wedge
 */

// Orders
export {
  less,
  greater,
  compareBy,
  reverse,
  fromComparator,
  naturalKeyOrder,
  directionCompare,
} from './comparators.js';
export type { Scalar } from './comparators.js';

// Boundary search and storage
export { wedgeSearch } from './search.js';
export type { IndexedView, SearchResult } from './search.js';
export { RingDeque } from './ring-deque.js';

// Wedge representations
export { BaseWedge } from './base-wedge.js';
export type { BaseWedgeOptions } from './base-wedge.js';
export { RingWedge } from './ring-wedge.js';
export type { RingWedgeOptions } from './ring-wedge.js';
export { TreeWedge } from './tree-wedge.js';

// Construction
export { createWedge, minWedge, maxWedge, directionWedge } from './factory.js';
export type { WedgeOptions, ScalarWedgeOptions } from './factory.js';

// Rolling windows
export {
  RollingExtremum,
  RollingRange,
  rollingMin,
  rollingMax,
  rollingRange,
} from './rolling.js';
export type { RollingOptions, RollingRangeOptions, RangeSnapshot } from './rolling.js';

// Contract re-exports
export type {
  Compare,
  KeyDomain,
  MonoWedge,
  WedgeDirection,
  WedgeEntry,
  WedgeStats,
} from '@monowedge/contracts';
