import { describe, it, expect } from 'vitest';
import { LatencyTracker, calculateLatency, percentile } from '../src/metrics/index.js';

describe('calculateLatency', () => {
  it('should summarise measurements', () => {
    expect(calculateLatency([4, 1, 3, 2])).toEqual({
      min: 1,
      max: 4,
      mean: 2.5,
      median: 2.5,
      p95: 3.85,
      p99: 3.97,
      total: 10,
      count: 4,
    });
  });

  it('should keep microsecond resolution', () => {
    expect(calculateLatency([0.0125]).min).toBe(0.013);
  });

  it('should return zeros for no measurements', () => {
    expect(calculateLatency([])).toEqual({
      min: 0,
      max: 0,
      mean: 0,
      median: 0,
      p95: 0,
      p99: 0,
      total: 0,
      count: 0,
    });
  });
});

describe('percentile', () => {
  it('should interpolate between neighbours', () => {
    expect(percentile([10, 20], 50)).toBe(15);
    expect(percentile([10, 20, 30], 50)).toBe(20);
    expect(percentile([7], 99)).toBe(7);
  });
});

describe('LatencyTracker', () => {
  it('should record measured and added latencies', () => {
    const tracker = new LatencyTracker();

    expect(tracker.measure(() => 'done')).toBe('done');
    tracker.add(5);

    const latencies = tracker.getLatencies();
    expect(latencies).toHaveLength(2);
    expect(latencies[0]).toBeGreaterThanOrEqual(0);
    expect(latencies[1]).toBe(5);
    expect(tracker.getMetrics().count).toBe(2);
  });

  it('should record and stop timing when the measured function throws', () => {
    const tracker = new LatencyTracker();

    expect(() =>
      tracker.measure(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(tracker.getLatencies()).toHaveLength(1);
    expect(() => tracker.stop()).toThrow('LatencyTracker.stop() called before start()');
  });

  it('should refuse to stop before starting', () => {
    expect(() => new LatencyTracker().stop()).toThrow('LatencyTracker.stop() called before start()');
  });

  it('should reset', () => {
    const tracker = new LatencyTracker();
    tracker.add(1);
    tracker.reset();

    expect(tracker.getLatencies()).toEqual([]);
  });
});
