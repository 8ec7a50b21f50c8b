/**
 * @fileoverview Global handlers for uncaught exceptions and unhandled rejections.
 * Errors are logged, the logger is flushed, then the process exits with code 1.
 */

import type { Logger } from './types.js';

/**
 * How long to wait for transports to flush before exiting anyway.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Removes the handlers installed by {@link attachGlobalHandlers}.
 */
export type DetachHandlers = () => void;

let detachCurrent: DetachHandlers | null = null;

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    const described: Record<string, unknown> = {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    };
    // Coded errors carry a machine-readable code.
    if ('code' in reason) {
      described['code'] = reason.code;
    }
    return described;
  }
  return { message: String(reason), value: reason };
}

/**
 * Attaches process-level error handlers.
 *
 * Uncaught exceptions and unhandled rejections are logged as fatal and end
 * the process with exit code 1. Warnings are logged and otherwise ignored.
 * A second call while handlers are attached only logs a warning.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * import { createLogger, attachGlobalHandlers } from '@monowedge/logger';
 *
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): DetachHandlers {
  if (detachCurrent !== null) {
    logger.warn('Global error handlers already attached, skipping');
    return detachCurrent;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);

  const detach: DetachHandlers = () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    if (detachCurrent === detach) {
      detachCurrent = null;
    }
  };
  detachCurrent = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detach;
}

/**
 * Exits once the logger has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
