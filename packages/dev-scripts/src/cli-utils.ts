/**
 * Shared CLI utilities for @monowedge/dev-scripts
 *
 * - All CLIs output JSON by default (machine-readable)
 * - --pretty switches to a human-readable summary
 * - Logs go to stderr, results to stdout
 * - Exit codes: 0 = success, 1 = mismatch found, 2 = fatal error or bad usage
 */

import { createChildLogger, createLogger, type Logger } from '@monowedge/logger';
import type { Config } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  MISMATCH: 1,
  FATAL: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Parsed command-line arguments
 */
export interface ParsedArgs {
  help: boolean;           // --help, -h
  pretty: boolean;         // --pretty: human-readable output
  csv: boolean;            // --csv: semicolon-separated rows instead of JSON
  trace: boolean;          // --trace: per-step wedge contents
  options: Record<string, string>; // --key=value
  remaining: string[];     // positional arguments and unknown flags
}

/**
 * Standard result object structure returned by all CLIs
 */
export interface CliResult {
  success: boolean;
  command: string;
  timestamp: string;       // ISO 8601
  data: unknown;
  warnings?: string[];
  errors?: string[];
}

/**
 * Parse command-line arguments.
 *
 * @example
 * parseArgs(['--csv', '--window=20', 'extra']);
 * // => { help: false, pretty: false, csv: true, trace: false,
 * //      options: { window: '20' }, remaining: ['extra'] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    pretty: false,
    csv: false,
    trace: false,
    options: {},
    remaining: [],
  };

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--pretty') {
      args.pretty = true;
    } else if (arg === '--csv') {
      args.csv = true;
    } else if (arg === '--trace') {
      args.trace = true;
    } else if (arg.startsWith('--') && arg.includes('=')) {
      const separator = arg.indexOf('=');
      args.options[arg.slice(2, separator)] = arg.slice(separator + 1);
    } else {
      args.remaining.push(arg);
    }
  }

  return args;
}

/**
 * Standardized help text.
 */
export function formatHelp(commandName: string, description: string, additionalHelp?: string): string {
  return `
${commandName} - ${description}

USAGE:
  ${commandName} [options]

OPTIONS:
  --help, -h        Show this help message
  --pretty          Human-readable formatted output (default: JSON)
${additionalHelp ? `${additionalHelp}\n` : ''}
OUTPUT:
  By default, outputs machine-readable JSON to stdout. Logs go to stderr.

EXIT CODES:
  0  Success
  1  Mismatch found
  2  Fatal error or invalid usage
`;
}

export function printHelp(commandName: string, description: string, additionalHelp?: string): void {
  console.log(formatHelp(commandName, description, additionalHelp));
}

/**
 * Render a result as single-line JSON, or as a multi-line block when
 * `pretty` is set.
 */
export function renderResult(result: CliResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result);
  }

  const lines: string[] = [
    '='.repeat(60),
    `Command: ${result.command}`,
    `Status: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    `Timestamp: ${result.timestamp}`,
    '='.repeat(60),
    '',
    'Data:',
    JSON.stringify(result.data, null, 2),
  ];

  if (result.warnings && result.warnings.length > 0) {
    lines.push('', 'Warnings:', ...result.warnings.map((w) => `  - ${w}`));
  }

  if (result.errors && result.errors.length > 0) {
    lines.push('', 'Errors:', ...result.errors.map((e) => `  - ${e}`));
  }

  return lines.join('\n');
}

export function outputResult(result: CliResult, pretty: boolean): void {
  console.log(renderResult(result, pretty));
}

/**
 * Create a standard result object
 *
 * @example
 * const result = createResult('wedge-verify', false, { failures: 2 }, {
 *   errors: ['brown/window=32/dense/max: 3 mismatches'],
 * });
 */
export function createResult(
  command: string,
  success: boolean,
  data: unknown,
  options: {
    warnings?: string[];
    errors?: string[];
  } = {}
): CliResult {
  return {
    success,
    command,
    timestamp: new Date().toISOString(),
    data,
    warnings: options.warnings,
    errors: options.errors,
  };
}

/**
 * Logger for a CLI run. Console output goes to stderr.
 */
export function createCliLogger(logging: Config['logging'], component: string): Logger {
  const logger = createLogger({
    level: logging.level,
    json: logging.format === 'json',
    filePath: logging.filePath,
  });
  return createChildLogger(logger, { component });
}
