/**
 * Type definitions for metrics computation
 * @module @monowedge/dev-scripts/metrics/types
 */

/**
 * Latency statistics in milliseconds, rounded to the microsecond
 */
export interface LatencyMetrics {
  min: number;
  max: number;
  mean: number;
  median: number;
  /** 95th percentile */
  p95: number;
  /** 99th percentile */
  p99: number;
  /** Sum of all samples */
  total: number;
  /** Number of samples */
  count: number;
}
