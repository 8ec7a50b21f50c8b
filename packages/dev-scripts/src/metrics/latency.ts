/**
 * Latency metrics calculation
 *
 * @module @monowedge/dev-scripts/metrics/latency
 */

import { startTimer, type PerfTimer } from '@monowedge/logger';
import type { LatencyMetrics } from './types.js';

/**
 * Calculate latency metrics from timing measurements
 *
 * Percentiles interpolate linearly between neighbouring samples.
 *
 * @param latencies - Measurements in milliseconds
 *
 * @example
 * const metrics = calculateLatency([1, 2, 3, 4]);
 * // => { min: 1, max: 4, mean: 2.5, median: 2.5, p95: 3.85, p99: 3.97, total: 10, count: 4 }
 */
export function calculateLatency(latencies: readonly number[]): LatencyMetrics {
  if (latencies.length === 0) {
    return { min: 0, max: 0, mean: 0, median: 0, p95: 0, p99: 0, total: 0, count: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const total = latencies.reduce((sum, l) => sum + l, 0);

  return {
    min: round3(sorted[0] ?? 0),
    max: round3(sorted[sorted.length - 1] ?? 0),
    mean: round3(total / latencies.length),
    median: round3(percentile(sorted, 50)),
    p95: round3(percentile(sorted, 95)),
    p99: round3(percentile(sorted, 99)),
    total: round3(total),
    count: latencies.length,
  };
}

/**
 * Value at percentile `p` (0-100) of an ascending array
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (sorted.length === 1) return sorted[0] ?? 0;

  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);

  const lowerValue = sorted[lower] ?? 0;
  if (lower === upper) {
    return lowerValue;
  }

  const upperValue = sorted[upper] ?? 0;
  return lowerValue + (upperValue - lowerValue) * (index - lower);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Collects per-operation latencies.
 *
 * @example
 * const tracker = new LatencyTracker();
 * tracker.start();
 * wedge.update(key, value);
 * tracker.stop();
 * tracker.getMetrics();
 */
export class LatencyTracker {
  private latencies: number[] = [];
  private timer: PerfTimer | null = null;

  start(): void {
    this.timer = startTimer();
  }

  /**
   * Stop timing and record the latency
   * @returns The recorded latency in milliseconds
   * @throws Error if start() was not called
   */
  stop(): number {
    if (this.timer === null) {
      throw new Error('LatencyTracker.stop() called before start()');
    }
    const elapsed = this.timer.stop();
    this.timer = null;
    this.latencies.push(elapsed);
    return elapsed;
  }

  /**
   * Time `fn` and record its latency.
   */
  measure<T>(fn: () => T): T {
    this.start();
    try {
      return fn();
    } finally {
      this.stop();
    }
  }

  add(latency: number): void {
    this.latencies.push(latency);
  }

  getLatencies(): number[] {
    return [...this.latencies];
  }

  getMetrics(): LatencyMetrics {
    return calculateLatency(this.latencies);
  }

  reset(): void {
    this.latencies = [];
    this.timer = null;
  }
}
