/**
 * @fileoverview Type definitions for the logger package.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that reaches a transport.
 * - 'error': failures that abort a run
 * - 'warn': conditions worth reviewing (mismatches, retries)
 * - 'info': run lifecycle and summaries
 * - 'debug': per-step detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/verify.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: machine-readable JSON
   * - false: human-readable pretty-print
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to the console.
   */
  filePath?: string;

  /**
   * Whether to enable console output. Console output goes to stderr so
   * that stdout stays free for command results.
   * @default true
   */
  console?: boolean;

  /**
   * Additional destination stream, e.g. to capture output in tests.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Structured log entry with standard fields.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Component or module name (typically from child logger) */
  component?: string;

  /** Signal kind being processed */
  signal?: string;

  /** Wedge direction, 'min' or 'max' */
  direction?: string;

  /** Window width in key units */
  window?: number;

  /** Operation duration in milliseconds */
  duration_ms?: number;

  /** Operation result (e.g., "pass", "fail") */
  result?: string;

  [key: string]: unknown;
}

/**
 * Fields a child logger stamps onto every entry.
 *
 * @example
 * ```typescript
 * const verifyLogger = logger.child({ component: 'wedge-verify', window: 512 });
 * verifyLogger.info('Case passed'); // includes component and window
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  signal?: string;
  direction?: string;
  window?: number;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so callers need not depend on winston.
 */
export type Logger = WinstonLogger;
