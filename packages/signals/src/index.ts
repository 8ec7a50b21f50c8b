/**
 * @fileoverview Main entry point for @monowedge/signals package.
 *
 * Deterministic signal synthesis for verification runs and demos.
 *
 * @module @monowedge/signals
 */

export { seededRandom } from './random.js';
export { SIGNAL_KINDS, synthesize } from './generators.js';
export type { SignalKind, SignalOptions } from './generators.js';
