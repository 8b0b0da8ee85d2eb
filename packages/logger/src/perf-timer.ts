/**
 * @fileoverview Timing helpers for `duration_ms` log fields.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, rounded; frozen once stopped */
  elapsed(): number;

  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.getSeries(params);
 * logger.info('Series fetched', { count: bars.length, duration_ms: timer.stop() });
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

export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  return { result, duration_ms: timer.stop() };
}

export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
