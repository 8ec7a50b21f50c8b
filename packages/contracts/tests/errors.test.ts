/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  WedgeError,
  EmptyWedgeError,
  KeyOrderError,
  ConcurrentModificationError,
  WindowConfigError,
  isWedgeError,
  isEmptyWedgeError,
  isKeyOrderError,
  isConcurrentModificationError,
  isWindowConfigError,
} from '../src/errors.js';

describe('WedgeError', () => {
  it('should create error with code and message', () => {
    const error = new WedgeError('TEST_CODE', 'Test message');

    expect(error.name).toBe('WedgeError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.data).toBeUndefined();
    expect(error.stack).toBeDefined();
  });

  it('should have valid ISO timestamp', () => {
    const error = new WedgeError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new WedgeError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json['name']).toBe('WedgeError');
    expect(json['code']).toBe('TEST_CODE');
    expect(json['message']).toBe('Test message');
    expect(json['data']).toEqual({ key: 'value' });
    expect(json['timestamp']).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new WedgeError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed: unknown = JSON.parse(JSON.stringify(error));

    expect(parsed).toMatchObject({ name: 'WedgeError', code: 'TEST_CODE', message: 'Test message' });
  });
});

describe('EmptyWedgeError', () => {
  it('should name the failing operation', () => {
    const error = new EmptyWedgeError('popFront');

    expect(error.name).toBe('EmptyWedgeError');
    expect(error.code).toBe('WEDGE_EMPTY');
    expect(error.message).toBe('Cannot call popFront() on an empty wedge');
    expect(error.data).toEqual({ operation: 'popFront' });
    expect(error).toBeInstanceOf(WedgeError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('KeyOrderError', () => {
  it('should record both keys as strings', () => {
    const error = new KeyOrderError(3n, 7n);

    expect(error.name).toBe('KeyOrderError');
    expect(error.code).toBe('WEDGE_KEY_ORDER');
    expect(error.message).toBe('Key 3 is not strictly greater than the newest stored key 7');
    expect(error.data).toEqual({ key: '3', lastKey: '7' });
    expect(() => JSON.stringify(error)).not.toThrow();
  });
});

describe('WindowConfigError', () => {
  it('should carry the offending configuration', () => {
    const error = new WindowConfigError('Window must be a positive finite number', { window: -1 });

    expect(error.code).toBe('WEDGE_WINDOW_CONFIG');
    expect(error.data).toEqual({ window: -1 });
  });
});

describe('Type guards', () => {
  const empty = new EmptyWedgeError('front');
  const order = new KeyOrderError(1, 2);
  const concurrent = new ConcurrentModificationError();
  const windowError = new WindowConfigError('bad window');
  const plain = new Error('plain');

  it('isWedgeError should accept every wedge error', () => {
    expect(isWedgeError(empty)).toBe(true);
    expect(isWedgeError(order)).toBe(true);
    expect(isWedgeError(concurrent)).toBe(true);
    expect(isWedgeError(windowError)).toBe(true);
    expect(isWedgeError(plain)).toBe(false);
    expect(isWedgeError('WEDGE_EMPTY')).toBe(false);
  });

  it('specific guards should only accept their own class', () => {
    expect(isEmptyWedgeError(empty)).toBe(true);
    expect(isEmptyWedgeError(order)).toBe(false);
    expect(isKeyOrderError(order)).toBe(true);
    expect(isKeyOrderError(empty)).toBe(false);
    expect(isConcurrentModificationError(concurrent)).toBe(true);
    expect(isConcurrentModificationError(plain)).toBe(false);
    expect(isWindowConfigError(windowError)).toBe(true);
    expect(isWindowConfigError(concurrent)).toBe(false);
  });
});
