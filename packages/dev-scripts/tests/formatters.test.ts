import { describe, it, expect } from 'vitest';
import { formatCsv, formatRunSummary, formatTraceStep, formatVerifySummary } from '../src/formatters/index.js';
import type { VerifyReport } from '../src/verify.js';

const latency = { min: 0, max: 0.01, mean: 0.002, median: 0.001, p95: 0.004, p99: 0.008, total: 1.2, count: 600 };

describe('formatCsv', () => {
  it('should write semicolon-separated rows without a header', () => {
    expect(
      formatCsv([
        { time: 0, value: 0.5, extremum: 0.5 },
        { time: 1, value: -1, extremum: 0.5 },
      ])
    ).toBe('0;0.5;0.5\n1;-1;0.5');
  });

  it('should return an empty string for no rows', () => {
    expect(formatCsv([])).toBe('');
  });
});

describe('formatTraceStep', () => {
  it('should show the extremum, removed entries and wedge contents', () => {
    const text = formatTraceStep(
      {
        time: 3,
        value: 0.5,
        extremum: 0.5,
        removed: [{ key: 0, value: 0.25 }],
        wedge: [{ key: 3, value: 0.5 }],
      },
      3,
      'max'
    );

    expect(text).toBe('3/0.5\tmax=3/0.5\n  - Remove 0/0.25 (older than 3)\n  Wedge: 3/0.5');
  });
});

describe('formatVerifySummary', () => {
  it('should list each case with its mismatches', () => {
    const report: VerifyReport = {
      passed: false,
      length: 600,
      seed: 1,
      cases: [
        {
          signal: 'white',
          window: 32,
          keys: 'dense',
          direction: 'max',
          passed: true,
          mismatchCount: 0,
          mismatches: [],
          peakSize: 9,
          latency,
        },
        {
          signal: 'brown',
          window: 32,
          keys: 'sparse',
          direction: 'min',
          passed: false,
          mismatchCount: 1,
          mismatches: [{ time: 40, expected: -2, actual: -1 }],
          peakSize: 12,
          latency,
        },
      ],
    };

    expect(formatVerifySummary(report).split('\n')).toEqual([
      '=== Wedge Verification ===',
      'Cases: 2 | Passed: 1 | Failed: 1',
      'Signal length: 600 | Seed: 1',
      '',
      '  OK     white/window=32/dense/max peak=9 p99=0.008ms',
      '  FAILED brown/window=32/sparse/min peak=12 p99=0.008ms',
      '         t=40: expected -2, got -1',
    ]);
  });
});

describe('formatRunSummary', () => {
  it('should describe the run and its counters', () => {
    const text = formatRunSummary({
      signal: 'white',
      direction: 'max',
      keys: 'dense',
      window: 20,
      samples: 2,
      seed: 1,
      final: { time: 1, value: 0.25, extremum: 0.75 },
      peakSize: 2,
      stats: { inserted: 2, evicted: 0, popped: 0, probes: 1 },
      latency,
      rows: [],
    });

    expect(text.split('\n').slice(0, 6)).toEqual([
      '=== Rolling Run ===',
      'Signal: white | Direction: max | Keys: dense',
      'Window: 20 | Samples: 2 | Seed: 1',
      'Final: t=1 value=0.25 max=0.75',
      'Peak wedge size: 2',
      'Evicted: 0 | Popped: 0 | Probes: 1',
    ]);
  });
});
