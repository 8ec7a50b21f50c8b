/**
 * Synthetic test signals.
 *
 * Every generator is deterministic for a given seed so brute-force
 * comparisons and CSV exports can be reproduced exactly.
 */

import { seededRandom } from './random.js';

export const SIGNAL_KINDS = [
  'white',
  'ascending',
  'descending',
  'whiteAscending',
  'whiteDescending',
  'brown',
  'red',
  'sine',
  'square',
  'noisySine',
] as const;

/**
 * - white: uniform noise in [-1, 1)
 * - ascending / descending: strictly monotonic ramps
 * - whiteAscending / whiteDescending: ramps with white noise on top
 * - brown: random walk (running sum of white noise)
 * - red: first difference of white noise
 * - sine: sin(0.01 i)
 * - square: +1 / -1, flipping every 64 samples
 * - noisySine: sine plus white noise
 */
export type SignalKind = (typeof SIGNAL_KINDS)[number];

export interface SignalOptions {
  length: number;
  /** @default 1 */
  seed?: number;
}

const RAMP_SLOPE = 0.01;
const SINE_RATE = 0.01;
const SQUARE_HALF_PERIOD = 64;

/**
 * Generates `length` samples of the requested signal.
 *
 * @example
 * ```typescript
 * const samples = synthesize('square', { length: 256 });
 * samples[0];   // -1
 * samples[64];  // 1
 * ```
 */
export function synthesize(kind: SignalKind, options: SignalOptions): number[] {
  const { length, seed = 1 } = options;
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Signal length must be a non-negative integer, got ${length}`);
  }

  const random = seededRandom(seed);
  const noise = (): number => 2 * random() - 1;
  const samples: number[] = new Array<number>(length);

  let previous = 0;
  let walk = 0;

  for (let i = 0; i < length; i++) {
    switch (kind) {
      case 'white':
        samples[i] = noise();
        break;
      case 'ascending':
        samples[i] = RAMP_SLOPE * i;
        break;
      case 'descending':
        samples[i] = -RAMP_SLOPE * i;
        break;
      case 'whiteAscending':
        samples[i] = RAMP_SLOPE * i + noise();
        break;
      case 'whiteDescending':
        samples[i] = -RAMP_SLOPE * i + noise();
        break;
      case 'brown':
        walk += noise();
        samples[i] = walk;
        break;
      case 'red': {
        const current = noise();
        samples[i] = current - previous;
        previous = current;
        break;
      }
      case 'sine':
        samples[i] = Math.sin(SINE_RATE * i);
        break;
      case 'square':
        samples[i] = i & SQUARE_HALF_PERIOD ? 1 : -1;
        break;
      case 'noisySine':
        samples[i] = Math.sin(SINE_RATE * i) + noise();
        break;
    }
  }

  return samples;
}
