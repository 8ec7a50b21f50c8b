/**
 * Rolling extremum over a synthesized signal.
 *
 * Each sample is pushed into a trailing window; entries older than the
 * window are popped from the front and reported to the trace callback.
 */

import { synthesize } from '@monowedge/signals';
import { RollingExtremum, directionCompare, type WedgeEntry, type WedgeStats } from '@monowedge/wedge';
import type { RunConfig } from './config.js';
import { LatencyTracker, type LatencyMetrics } from './metrics/index.js';

export interface RollingRow {
  time: number;
  value: number;
  extremum: number;
}

export interface TraceStep extends RollingRow {
  /** Entries that aged out of the window at this step, oldest first */
  removed: WedgeEntry<number, number>[];
  /** Wedge contents after the step */
  wedge: WedgeEntry<number, number>[];
}

export interface RunReport {
  signal: RunConfig['signal'];
  direction: RunConfig['direction'];
  keys: RunConfig['keys'];
  window: number;
  samples: number;
  seed: number;
  /** Extremum of the last window */
  final: RollingRow | null;
  /** Largest wedge size seen */
  peakSize: number;
  stats: WedgeStats;
  latency: LatencyMetrics;
  rows: RollingRow[];
}

export interface RunHooks {
  onStep?: (step: TraceStep) => void;
}

export function runRolling(config: RunConfig, hooks: RunHooks = {}): RunReport {
  const signal = synthesize(config.signal, { length: config.samples, seed: config.seed });
  let removed: WedgeEntry<number, number>[] = [];

  const rolling = new RollingExtremum<number>({
    compare: directionCompare<number>(config.direction),
    window: config.window,
    keys: config.keys,
    onExpire: (entry) => removed.push(entry),
  });

  const tracker = new LatencyTracker();
  const rows: RollingRow[] = [];
  let peakSize = 0;

  signal.forEach((value, time) => {
    const front = tracker.measure(() => rolling.pushAt(time, value));
    const row: RollingRow = { time, value, extremum: front.value };
    rows.push(row);
    peakSize = Math.max(peakSize, rolling.size());

    if (hooks.onStep) {
      hooks.onStep({ ...row, removed, wedge: [...rolling.wedge] });
    }
    removed = [];
  });

  return {
    signal: config.signal,
    direction: config.direction,
    keys: config.keys,
    window: config.window,
    samples: config.samples,
    seed: config.seed,
    final: rows[rows.length - 1] ?? null,
    peakSize,
    stats: rolling.wedge.stats(),
    latency: tracker.getMetrics(),
    rows,
  };
}
