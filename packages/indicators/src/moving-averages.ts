/**
 * Rolling-window primitives shared by the indicators.
 * Pure functions over plain number arrays; warm-up positions are `undefined`.
 */

/**
 * Exponential moving average with smoothing `2 / (span + 1)`.
 *
 * Seeded from the first value and applied recursively with no bias
 * adjustment, so the output is defined at every index.
 *
 * @example
 * ```typescript
 * ema([1, 2, 3], 3); // [1, 1.5, 2.25]
 * ```
 */
export function ema(values: readonly number[], span: number): number[] {
  const alpha = 2 / (span + 1);
  const result: number[] = [];

  let previous: number | undefined;
  for (const value of values) {
    const current = previous === undefined ? value : alpha * value + (1 - alpha) * previous;
    result.push(current);
    previous = current;
  }

  return result;
}

/**
 * Simple moving average over a trailing window of `window` values.
 * The first `window - 1` positions are undefined.
 */
export function sma(values: readonly number[], window: number): (number | undefined)[] {
  return values.map((_, i) => {
    if (i < window - 1) return undefined;
    return mean(values, i - window + 1, i + 1);
  });
}

/**
 * Rolling sample standard deviation (n - 1 denominator) over a trailing
 * window. Undefined during warm-up and for windows shorter than 2.
 */
export function rollingStd(values: readonly number[], window: number): (number | undefined)[] {
  return values.map((_, i) => {
    if (window < 2 || i < window - 1) return undefined;

    const start = i - window + 1;
    const avg = mean(values, start, i + 1);
    let sumSquares = 0;
    for (let j = start; j <= i; j++) {
      const deviation = (values[j] ?? avg) - avg;
      sumSquares += deviation * deviation;
    }
    return Math.sqrt(sumSquares / (window - 1));
  });
}

/**
 * Mean of `values[start..end)`.
 */
function mean(values: readonly number[], start: number, end: number): number {
  let sum = 0;
  for (let j = start; j < end; j++) {
    sum += values[j] ?? 0;
  }
  return sum / (end - start);
}

/**
 * Elementwise difference of two aligned columns.
 */
export function subtract(left: readonly number[], right: readonly number[]): number[] {
  return left.map((value, i) => value - (right[i] ?? Number.NaN));
}
