/**
 * @fileoverview Public API exports for @monowedge/logger
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats
export { standardFields, prettyPrint, renderLine } from './formats.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';
export type { DetachHandlers } from './errorHandler.js';

// Performance timing utilities
export { startTimer } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
