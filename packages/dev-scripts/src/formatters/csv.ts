/**
 * CSV output for rolling runs
 *
 * One row per sample, `time;value;extremum`, semicolon-separated, no
 * header. Loads directly into spreadsheet tools set to a decimal comma.
 *
 * @module @monowedge/dev-scripts/formatters/csv
 */

import type { RollingRow } from '../rolling-run.js';

export const CSV_SEPARATOR = ';';

/**
 * @example
 * formatCsv([{ time: 0, value: 0.5, extremum: 0.5 }, { time: 1, value: -1, extremum: 0.5 }]);
 * // => '0;0.5;0.5\n1;-1;0.5'
 */
export function formatCsv(rows: readonly RollingRow[]): string {
  return rows
    .map((row) => [row.time, row.value, row.extremum].map(String).join(CSV_SEPARATOR))
    .join('\n');
}
