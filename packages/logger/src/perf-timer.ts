/**
 * @fileoverview High-resolution timing.
 * Durations are fractional milliseconds from performance.now(); a single
 * wedge update takes well under a millisecond, so nothing is rounded.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * wedge.update(key, value);
 * latencies.push(timer.stop());
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return endTime - state.startTime;
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return state.endTime - state.startTime;
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}
