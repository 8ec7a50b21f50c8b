/**
 * @module @monowedge/dev-scripts/metrics
 */

export * from './types.js';
export * from './latency.js';
