/**
 * Clock utilities for time-dependent tests
 */

/**
 * Hand-driven clock for TTL and timestamp assertions
 */
export interface ManualClock {
  /** Current time in epoch milliseconds; pass as a `now` option */
  now: () => number;
  /** Move the clock forward */
  advance(ms: number): void;
  /** Jump to an absolute time */
  set(ms: number): void;
}

/**
 * Create a clock that only moves when told to
 * @param start - Initial epoch milliseconds (default: 1_700_000_000_000)
 */
export function manualClock(start = 1_700_000_000_000): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number): void {
      current += ms;
    },
    set(ms: number): void {
      current = ms;
    },
  };
}

/**
 * Wait for a specified duration
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
