/**
 * @fileoverview Performance timing helpers (performance.now() based)
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, rounded; frozen once stopped */
  elapsed(): number;

  /** Stop the timer and return the final duration; later calls return the same value */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.getDailyBars(params);
 * logger.info('Bars loaded', { count: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Run an async function and report how long it took.
 * A rejection propagates unchanged; nothing is measured for it.
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}

export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  return { result, duration_ms: timer.stop() };
}
