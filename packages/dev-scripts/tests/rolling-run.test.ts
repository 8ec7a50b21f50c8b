import { describe, it, expect } from 'vitest';
import type { RunConfig } from '../src/config.js';
import { runRolling, type TraceStep } from '../src/rolling-run.js';

const base: RunConfig = {
  samples: 8,
  window: 3,
  seed: 1,
  signal: 'ascending',
  direction: 'min',
  keys: 'dense',
};

describe('runRolling', () => {
  it('should report the trailing minimum of a ramp', () => {
    const report = runRolling(base);

    expect(report.rows.map((row) => row.extremum)).toEqual([
      0,
      0,
      0,
      0.01 * 1,
      0.01 * 2,
      0.01 * 3,
      0.01 * 4,
      0.01 * 5,
    ]);
    expect(report.final).toEqual({ time: 7, value: 0.01 * 7, extremum: 0.01 * 5 });
    expect(report.peakSize).toBe(3);
    expect(report.stats).toEqual({ inserted: 8, evicted: 0, popped: 5, probes: report.stats.probes });
    expect(report.latency.count).toBe(8);
  });

  it('should keep only the newest sample for the maximum of a ramp', () => {
    const report = runRolling({ ...base, direction: 'max', keys: 'sparse' });

    expect(report.rows.map((row) => row.extremum)).toEqual(report.rows.map((row) => row.value));
    expect(report.peakSize).toBe(1);
    expect(report.stats.evicted).toBe(7);
  });

  it('should trace removed entries and wedge contents', () => {
    const steps: TraceStep[] = [];
    runRolling({ ...base, samples: 4 }, { onStep: (step) => steps.push(step) });

    expect(steps).toHaveLength(4);
    expect(steps[2]?.removed).toEqual([]);
    expect(steps[3]).toEqual({
      time: 3,
      value: 0.01 * 3,
      extremum: 0.01 * 1,
      removed: [{ key: 0, value: 0 }],
      wedge: [
        { key: 1, value: 0.01 * 1 },
        { key: 2, value: 0.01 * 2 },
        { key: 3, value: 0.01 * 3 },
      ],
    });
  });
});
