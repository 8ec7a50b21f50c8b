#!/usr/bin/env node

/**
 * rolling-run - Rolling extremum over a synthesized signal
 *
 * USAGE:
 *   rolling-run [--signal=white] [--window=20] [--samples=1000] [--direction=max]
 *               [--keys=dense] [--seed=1] [--csv] [--trace] [--pretty]
 *
 * OUTPUT:
 *   JSON summary (default), `time;value;extremum` rows (--csv) or a text
 *   summary (--pretty). --trace writes per-step wedge contents to stderr.
 *
 * EXIT CODES:
 *   0 - Run completed
 *   2 - Fatal error (invalid configuration, etc.)
 */

import { isWedgeError } from '@monowedge/contracts';
import { attachGlobalHandlers } from '@monowedge/logger';
import {
  EXIT_CODES,
  createCliLogger,
  createResult,
  outputResult,
  parseArgs,
  printHelp,
} from '../src/cli-utils.js';
import { ConfigError, loadConfig, type Config } from '../src/config.js';
import { formatCsv, formatRunSummary, formatTraceStep } from '../src/formatters/index.js';
import { runRolling } from '../src/rolling-run.js';

const COMMAND = 'rolling-run';

function main(): number {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp(
      COMMAND,
      'Track the rolling minimum or maximum of a synthesized signal',
      '  --csv             Print time;value;extremum rows instead of JSON\n' +
        '  --trace           Log removed entries and wedge contents per step (stderr)\n' +
        '  --signal=kind     Signal kind (env WEDGE_SIGNAL, default white)\n' +
        '  --window=n        Window width (env WEDGE_WINDOW, default 20)\n' +
        '  --samples=n       Signal length (env WEDGE_SAMPLES, default 1000)\n' +
        '  --direction=d     min or max (env WEDGE_DIRECTION, default max)\n' +
        '  --keys=domain     dense or sparse (env WEDGE_KEYS, default dense)\n' +
        '  --seed=n          Noise seed (env WEDGE_SEED, default 1)'
    );
    return EXIT_CODES.SUCCESS;
  }

  let config: Config;
  try {
    config = loadConfig({ options: args.options });
  } catch (error) {
    const errors = error instanceof ConfigError ? error.issues : [String(error)];
    outputResult(createResult(COMMAND, false, null, { errors }), args.pretty);
    return EXIT_CODES.FATAL;
  }

  const logger = createCliLogger(config.logging, COMMAND);
  attachGlobalHandlers(logger);
  const run = config.run;
  logger.info('Run started', { ...run });

  try {
    const report = runRolling(run, {
      onStep: args.trace
        ? (step) => process.stderr.write(`${formatTraceStep(step, run.window, run.direction)}\n\n`)
        : undefined,
    });

    logger.info('Run finished', {
      duration_ms: report.latency.total,
      peakSize: report.peakSize,
    });

    if (args.csv) {
      console.log(formatCsv(report.rows));
    } else if (args.pretty) {
      console.log(formatRunSummary(report));
    } else {
      const { rows: _rows, ...summary } = report;
      outputResult(createResult(COMMAND, true, summary), false);
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('Run failed', {
      error: error instanceof Error ? error.message : String(error),
      code: isWedgeError(error) ? error.code : undefined,
    });
    const message = error instanceof Error ? error.message : String(error);
    outputResult(createResult(COMMAND, false, null, { errors: [message] }), args.pretty);
    return EXIT_CODES.FATAL;
  }
}

process.exitCode = main();
