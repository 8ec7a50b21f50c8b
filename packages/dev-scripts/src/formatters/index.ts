/**
 * @module @monowedge/dev-scripts/formatters
 */

export { formatCsv, CSV_SEPARATOR } from './csv.js';
export { formatRunSummary, formatTraceStep, formatVerifySummary } from './summary.js';
