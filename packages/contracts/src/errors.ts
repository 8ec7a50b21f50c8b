/**
 * @fileoverview Error taxonomy for monotonic wedges and rolling windows.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and the ISO timestamp of its creation.
 *
 * @module @monowedge/contracts/errors
 */

/**
 * Base error class for all wedge errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new WedgeError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class WedgeError extends Error {
  /**
   * Machine-readable error code (e.g., 'WEDGE_EMPTY').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Operations that require at least one stored entry.
 */
export type EmptyWedgeOperation = 'front' | 'popFront';

/**
 * Thrown by `front()` or `popFront()` on a wedge holding no entries.
 *
 * Recoverable: check `isEmpty()` first, or always insert before querying.
 *
 * @example
 * ```typescript
 * const wedge = maxWedge<number>();
 * wedge.front(); // throws EmptyWedgeError { code: 'WEDGE_EMPTY', data: { operation: 'front' } }
 * ```
 */
export class EmptyWedgeError extends WedgeError {
  constructor(operation: EmptyWedgeOperation) {
    super('WEDGE_EMPTY', `Cannot call ${operation}() on an empty wedge`, { operation });
  }
}

/**
 * Thrown by `update()` on a non-empty wedge when the supplied key is not
 * strictly greater than the newest stored key.
 *
 * Keys are recorded as strings so the payload stays JSON-safe for bigint
 * and Date keys.
 */
export class KeyOrderError extends WedgeError {
  constructor(key: unknown, lastKey: unknown) {
    super(
      'WEDGE_KEY_ORDER',
      `Key ${String(key)} is not strictly greater than the newest stored key ${String(lastKey)}`,
      { key: String(key), lastKey: String(lastKey) }
    );
  }
}

/**
 * Thrown when an iterator is advanced after the wedge it reads was mutated.
 */
export class ConcurrentModificationError extends WedgeError {
  constructor() {
    super(
      'WEDGE_CONCURRENT_MODIFICATION',
      'Wedge was modified during iteration; obtain a new iterator after update(), popFront() or clear()'
    );
  }
}

/**
 * Thrown when a rolling window is configured with an unusable width or
 * key type.
 *
 * @example
 * ```typescript
 * throw new WindowConfigError('Window must be a positive finite number', { window: 0 });
 * ```
 */
export class WindowConfigError extends WedgeError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('WEDGE_WINDOW_CONFIG', message, data);
  }
}

/**
 * Type guard to check if an error is a WedgeError.
 *
 * @example
 * ```typescript
 * try {
 *   wedge.popFront();
 * } catch (err) {
 *   if (isWedgeError(err)) {
 *     console.error(`Wedge error [${err.code}]:`, err.message);
 *   }
 * }
 * ```
 */
export function isWedgeError(error: unknown): error is WedgeError {
  return error instanceof WedgeError;
}

export function isEmptyWedgeError(error: unknown): error is EmptyWedgeError {
  return error instanceof EmptyWedgeError;
}

export function isKeyOrderError(error: unknown): error is KeyOrderError {
  return error instanceof KeyOrderError;
}

export function isConcurrentModificationError(
  error: unknown
): error is ConcurrentModificationError {
  return error instanceof ConcurrentModificationError;
}

export function isWindowConfigError(error: unknown): error is WindowConfigError {
  return error instanceof WindowConfigError;
}
