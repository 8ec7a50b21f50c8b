/**
 * Text summaries for --pretty output
 *
 * Output is deterministic: same input, same text.
 *
 * @module @monowedge/dev-scripts/formatters/summary
 */

import type { WedgeEntry } from '@monowedge/wedge';
import type { LatencyMetrics } from '../metrics/index.js';
import type { RunReport, TraceStep } from '../rolling-run.js';
import { caseLabel, type VerifyReport } from '../verify.js';

function formatLatency(lat: LatencyMetrics): string[] {
  return [
    'Latency (ms):',
    `  Mean: ${lat.mean} | Median: ${lat.median} | P95: ${lat.p95} | P99: ${lat.p99}`,
    `  Min: ${lat.min} | Max: ${lat.max} | Total: ${lat.total}`,
  ];
}

function formatEntry(entry: WedgeEntry<number, number>): string {
  return `${entry.key}/${entry.value}`;
}

/**
 * @example
 * // === Rolling Run ===
 * // Signal: white | Direction: max | Keys: dense
 * // Window: 20 | Samples: 1000 | Seed: 1
 * // Final: t=999 value=0.12 max=0.97
 * // Peak wedge size: 9
 * // Evicted: 812 | Popped: 179 | Probes: 2103
 * // ...
 */
export function formatRunSummary(report: RunReport): string {
  const lines: string[] = [
    '=== Rolling Run ===',
    `Signal: ${report.signal} | Direction: ${report.direction} | Keys: ${report.keys}`,
    `Window: ${report.window} | Samples: ${report.samples} | Seed: ${report.seed}`,
  ];

  if (report.final) {
    lines.push(
      `Final: t=${report.final.time} value=${report.final.value} ${report.direction}=${report.final.extremum}`
    );
  }

  lines.push(
    `Peak wedge size: ${report.peakSize}`,
    `Evicted: ${report.stats.evicted} | Popped: ${report.stats.popped} | Probes: ${report.stats.probes}`,
    '',
    ...formatLatency(report.latency)
  );

  return lines.join('\n');
}

/**
 * One trace step: the sample, the extremum, removed entries, wedge contents.
 *
 * @example
 * // 25/0.7	max=25/0.7
 * //   - Remove 4/0.2 (older than 20)
 * //   Wedge: 25/0.7
 */
export function formatTraceStep(step: TraceStep, window: number, direction: string): string {
  const front = step.wedge[0];
  const lines: string[] = [
    `${step.time}/${step.value}\t${direction}=${front ? formatEntry(front) : '-'}`,
    ...step.removed.map((entry) => `  - Remove ${formatEntry(entry)} (older than ${window})`),
    `  Wedge: ${step.wedge.map(formatEntry).join('\t')}`,
  ];
  return lines.join('\n');
}

export function formatVerifySummary(report: VerifyReport): string {
  const failed = report.cases.filter((c) => !c.passed);
  const lines: string[] = [
    '=== Wedge Verification ===',
    `Cases: ${report.cases.length} | Passed: ${report.cases.length - failed.length} | Failed: ${failed.length}`,
    `Signal length: ${report.length} | Seed: ${report.seed}`,
    '',
  ];

  for (const result of report.cases) {
    lines.push(
      `  ${result.passed ? 'OK    ' : 'FAILED'} ${caseLabel(result)} peak=${result.peakSize} p99=${result.latency.p99}ms`
    );
    for (const m of result.mismatches) {
      lines.push(`         t=${m.time}: expected ${m.expected}, got ${m.actual}`);
    }
  }

  return lines.join('\n');
}
