/**
 * Brute-force verification of both wedge representations.
 *
 * For every signal kind and window, the trailing min and max computed by
 * each representation are compared sample by sample against a full rescan
 * of the window.
 */

import { z } from 'zod';
import { SIGNAL_KINDS, synthesize, type SignalKind } from '@monowedge/signals';
import {
  RollingExtremum,
  directionCompare,
  type KeyDomain,
  type WedgeDirection,
} from '@monowedge/wedge';
import { ConfigError } from './config.js';
import { LatencyTracker, type LatencyMetrics } from './metrics/index.js';

export const DEFAULT_WINDOWS = [32, 512, 4096] as const;
export const DEFAULT_LENGTH = 16384;

/** Mismatches kept per case; the count is always exact. */
const MAX_REPORTED_MISMATCHES = 5;

export interface VerifyOptions {
  /** @default SIGNAL_KINDS */
  kinds?: readonly SignalKind[];
  /** @default [32, 512, 4096] */
  windows?: readonly number[];
  /** @default 16384 */
  length?: number;
  /** @default 1 */
  seed?: number;
  /** @default ['dense', 'sparse'] */
  representations?: readonly KeyDomain[];
  onCase?: (result: CaseResult) => void;
}

export interface Mismatch {
  time: number;
  expected: number;
  actual: number;
}

export interface CaseResult {
  signal: SignalKind;
  window: number;
  keys: KeyDomain;
  direction: WedgeDirection;
  passed: boolean;
  mismatchCount: number;
  mismatches: Mismatch[];
  peakSize: number;
  latency: LatencyMetrics;
}

export interface VerifyReport {
  passed: boolean;
  length: number;
  seed: number;
  cases: CaseResult[];
}

/**
 * Trailing-window min and max by rescanning each window.
 */
export function bruteForceExtrema(
  signal: readonly number[],
  window: number
): Record<WedgeDirection, number[]> {
  const min: number[] = [];
  const max: number[] = [];

  for (let t = 0; t < signal.length; t++) {
    let lo = Infinity;
    let hi = -Infinity;
    for (let i = Math.max(0, t - window + 1); i <= t; i++) {
      const value = signal[i] ?? NaN;
      lo = Math.min(lo, value);
      hi = Math.max(hi, value);
    }
    min.push(lo);
    max.push(hi);
  }

  return { min, max };
}

function runCase(
  signal: readonly number[],
  expected: readonly number[],
  window: number,
  keys: KeyDomain,
  direction: WedgeDirection
): Omit<CaseResult, 'signal'> {
  const rolling = new RollingExtremum<number>({
    compare: directionCompare<number>(direction),
    window,
    keys,
  });
  const tracker = new LatencyTracker();
  const mismatches: Mismatch[] = [];
  let mismatchCount = 0;
  let peakSize = 0;

  signal.forEach((value, time) => {
    const actual = tracker.measure(() => rolling.push(value)).value;
    peakSize = Math.max(peakSize, rolling.size());

    const reference = expected[time] ?? NaN;
    if (actual !== reference) {
      mismatchCount++;
      if (mismatches.length < MAX_REPORTED_MISMATCHES) {
        mismatches.push({ time, expected: reference, actual });
      }
    }
  });

  return {
    window,
    keys,
    direction,
    passed: mismatchCount === 0,
    mismatchCount,
    mismatches,
    peakSize,
    latency: tracker.getMetrics(),
  };
}

export function verifyWedges(options: VerifyOptions = {}): VerifyReport {
  const {
    kinds = SIGNAL_KINDS,
    windows = DEFAULT_WINDOWS,
    length = DEFAULT_LENGTH,
    seed = 1,
    representations = ['dense', 'sparse'],
    onCase,
  } = options;

  const cases: CaseResult[] = [];

  for (const window of windows) {
    for (const kind of kinds) {
      const signal = synthesize(kind, { length, seed });
      const expected = bruteForceExtrema(signal, window);

      for (const keys of representations) {
        for (const direction of ['min', 'max'] as const) {
          const result: CaseResult = {
            signal: kind,
            ...runCase(signal, expected[direction], window, keys, direction),
          };
          cases.push(result);
          onCase?.(result);
        }
      }
    }
  }

  return {
    passed: cases.every((c) => c.passed),
    length,
    seed,
    cases,
  };
}

export function caseLabel(result: Pick<CaseResult, 'signal' | 'window' | 'keys' | 'direction'>): string {
  return `${result.signal}/window=${result.window}/${result.keys}/${result.direction}`;
}

const commaList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export const verifyOptionsSchema = z.object({
  windows: z
    .string()
    .transform(commaList)
    .pipe(z.array(z.coerce.number().int().positive()).nonempty())
    .optional(),
  kinds: z.string().transform(commaList).pipe(z.array(z.enum(SIGNAL_KINDS)).nonempty()).optional(),
  length: z.coerce.number().int().positive().optional(),
  representations: z
    .string()
    .transform(commaList)
    .pipe(z.array(z.enum(['dense', 'sparse'])).nonempty())
    .optional(),
});

export const VERIFY_OPTION_NAMES = ['windows', 'kinds', 'length', 'representations'] as const;

/**
 * Reads the verification options from `--key=value` options.
 *
 * @throws ConfigError listing every invalid option
 */
export function parseVerifyOptions(options: Record<string, string>): Omit<VerifyOptions, 'seed' | 'onCase'> {
  const picked: Record<string, string> = {};
  for (const name of VERIFY_OPTION_NAMES) {
    const value = options[name];
    if (value !== undefined) {
      picked[name] = value;
    }
  }

  const result = verifyOptionsSchema.safeParse(picked);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`));
  }
  return result.data;
}
