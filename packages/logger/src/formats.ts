/**
 * @fileoverview Custom winston formats: standard fields and pretty-print output.
 */

import { format } from 'winston';

/**
 * Fields pretty-print shows first, in this order.
 */
const LEADING_FIELDS = ['component', 'signal', 'direction', 'window'] as const;

/**
 * Fields winston manages itself; never rendered as context.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Adds an ISO 8601 timestamp and expands Error objects into message and stack.
 *
 * @example
 * ```typescript
 * const logFormat = format.combine(standardFields, format.json());
 * ```
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

function renderValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Renders an entry as one line of `key=value` context.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Case passed component=wedge-verify window=512 duration_ms=0.42
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const field of LEADING_FIELDS) {
    const value = info[field];
    if (value !== undefined) {
      context.push(`${field}=${renderValue(value)}`);
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || LEADING_FIELDS.some((field) => field === key)) {
      continue;
    }
    context.push(`${key}=${JSON.stringify(value)}`);
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const line = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
}

/**
 * Human-readable, colorized single-line output for terminals.
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
