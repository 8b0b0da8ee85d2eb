/**
 * Relative Strength Index over simple rolling means of gains and losses.
 */

import { sma } from './moving-averages.js';

/**
 * RSI per bar, bounded to [0, 100].
 *
 * The first delta is taken as 0, so the first value is defined at index
 * `period - 1`. A window without losses yields 100.
 *
 * @example
 * ```typescript
 * calculateRsi([1, 2, 3, 4], 3); // [undefined, undefined, 100, 100]
 * ```
 */
export function calculateRsi(closes: readonly number[], period: number): (number | undefined)[] {
  const gains: number[] = [];
  const losses: number[] = [];

  closes.forEach((close, i) => {
    const previous = i === 0 ? close : (closes[i - 1] ?? close);
    const delta = close - previous;
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  });

  const avgGains = sma(gains, period);
  const avgLosses = sma(losses, period);

  return avgGains.map((avgGain, i) => {
    const avgLoss = avgLosses[i];
    if (avgGain === undefined || avgLoss === undefined) return undefined;
    if (avgLoss === 0) return 100;
    return 100 - 100 / (1 + avgGain / avgLoss);
  });
}
