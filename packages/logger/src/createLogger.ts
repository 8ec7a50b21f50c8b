/**
 * @fileoverview Logger factory.
 * Creates winston logger instances with structured fields and console,
 * file or stream transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger, LogLevel } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

const ALL_LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Verification started', { windows: [32, 512, 4096] });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/rolling-run.log',
 * });
 *
 * const runLogger = logger.child({ component: 'rolling-run' });
 * runLogger.debug('Window advanced', { key: 42, size: 3 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    stream,
    console: enableConsole = true,
  } = config;

  // Standard fields are added once by the logger; transports only render.
  const output = json ? format.json() : prettyPrint;

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: output,
        stderrLevels: ALL_LEVELS,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // Files are always JSON.
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: output,
      })
    );
  }

  return winston.createLogger({
    level,
    format: standardFields,
    transports,
    // Fatal errors are handled in errorHandler.ts.
    exitOnError: false,
  });
}

/**
 * Creates a child logger that stamps `context` onto every entry.
 *
 * @example
 * ```typescript
 * const caseLogger = createChildLogger(logger, {
 *   component: 'wedge-verify',
 *   signal: 'brown',
 *   window: 4096,
 * });
 * caseLogger.warn('Mismatch', { time: 1234 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
