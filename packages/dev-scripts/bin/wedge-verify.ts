#!/usr/bin/env node

/**
 * wedge-verify - Brute-force verification of the wedge representations
 *
 * For every signal kind and window, compares the trailing min and max of
 * both representations against a full rescan, and reports per-update
 * latency.
 *
 * USAGE:
 *   wedge-verify [--windows=32,512,4096] [--kinds=white,brown] [--length=16384]
 *                [--representations=dense,sparse] [--seed=1] [--pretty]
 *
 * EXIT CODES:
 *   0 - Every case matched
 *   1 - At least one mismatch
 *   2 - Fatal error (invalid options, etc.)
 */

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
import { formatVerifySummary } from '../src/formatters/index.js';
import { VERIFY_OPTION_NAMES, caseLabel, parseVerifyOptions, verifyWedges } from '../src/verify.js';

const COMMAND = 'wedge-verify';

function main(): number {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp(
      COMMAND,
      'Compare both wedge representations against brute-force extrema',
      '  --windows=list    Comma-separated window widths (default 32,512,4096)\n' +
        '  --kinds=list      Comma-separated signal kinds (default all)\n' +
        '  --length=n        Samples per signal (default 16384)\n' +
        '  --representations=list  dense,sparse (default both)\n' +
        '  --seed=n          Noise seed (env WEDGE_SEED, default 1)'
    );
    return EXIT_CODES.SUCCESS;
  }

  let config: Config;
  let verifyOptions: ReturnType<typeof parseVerifyOptions>;
  try {
    config = loadConfig({ options: args.options, extraOptions: VERIFY_OPTION_NAMES });
    verifyOptions = parseVerifyOptions(args.options);
  } catch (error) {
    const errors = error instanceof ConfigError ? error.issues : [String(error)];
    outputResult(createResult(COMMAND, false, null, { errors }), args.pretty);
    return EXIT_CODES.FATAL;
  }

  const logger = createCliLogger(config.logging, COMMAND);
  attachGlobalHandlers(logger);
  logger.info('Verification started', { seed: config.run.seed, ...verifyOptions });

  const report = verifyWedges({
    ...verifyOptions,
    seed: config.run.seed,
    onCase: (result) => {
      if (result.passed) {
        logger.debug('Case passed', { case: caseLabel(result), p99_ms: result.latency.p99 });
      } else {
        logger.warn('Case failed', {
          case: caseLabel(result),
          mismatches: result.mismatchCount,
          first: result.mismatches[0],
        });
      }
    },
  });

  const failures = report.cases.filter((c) => !c.passed);
  logger.info('Verification finished', {
    result: report.passed ? 'pass' : 'fail',
    cases: report.cases.length,
    failures: failures.length,
  });

  if (args.pretty) {
    console.log(formatVerifySummary(report));
  } else {
    outputResult(
      createResult(COMMAND, report.passed, report, {
        errors: failures.map((c) => `${caseLabel(c)}: ${c.mismatchCount} mismatches`),
      }),
      false
    );
  }

  return report.passed ? EXIT_CODES.SUCCESS : EXIT_CODES.MISMATCH;
}

process.exitCode = main();
