/**
 * @fileoverview Main entry point for @monowedge/contracts package.
 *
 * Exports the wedge contract types and the error taxonomy.
 *
 * @module @monowedge/contracts
 */

// Wedge contract
export type {
  Compare,
  WedgeDirection,
  KeyDomain,
  WedgeEntry,
  WedgeStats,
  MonoWedge,
} from './wedge.js';

// Error classes and guards
export {
  WedgeError,
  EmptyWedgeError,
  KeyOrderError,
  ConcurrentModificationError,
  WindowConfigError,
  isWedgeError,
  isEmptyWedgeError,
  isKeyOrderError,
  isConcurrentModificationError,
  isWindowConfigError,
} from './errors.js';

export type { EmptyWedgeOperation } from './errors.js';
