/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { startTimer } from '../src/index.js';

function clock(...readings: number[]): void {
  const spy = vi.spyOn(performance, 'now');
  for (const reading of readings) {
    spy.mockReturnValueOnce(reading);
  }
}

describe('Performance Timers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('startTimer', () => {
    it('should keep sub-millisecond precision', () => {
      clock(10, 10.25);
      const timer = startTimer();

      expect(timer.startTime).toBe(10);
      expect(timer.stop()).toBe(0.25);
    });

    it('should freeze the duration once stopped', () => {
      clock(0, 1.5, 4);
      const timer = startTimer();

      expect(timer.elapsed()).toBe(1.5);
      expect(timer.isRunning()).toBe(true);
      expect(timer.stop()).toBe(4);
      expect(timer.isRunning()).toBe(false);
      expect(timer.elapsed()).toBe(4);
      expect(timer.stop()).toBe(4);
    });
  });
});
