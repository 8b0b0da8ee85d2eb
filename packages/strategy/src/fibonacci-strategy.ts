/**
 * Fibonacci retracement strategy.
 *
 * @module @marketlens/strategy/fibonacci
 */

import type { EnrichedSeries, Signal } from '@marketlens/contracts';
import { BaseStrategy, buySignal, neutralSignal } from './base.js';

export const FIBONACCI_RATIOS = [0, 0.236, 0.382, 0.5, 0.618, 0.786, 1] as const;

/** Ratios treated as support, checked in this order */
const SUPPORT_RATIOS = [0.236, 0.382, 0.618] as const;

const LEVEL_PROXIMITY = 0.02;

export interface FibonacciLevel {
  ratio: number;
  price: number;
}

/**
 * Retracement levels measured down from `high`.
 *
 * @example
 * ```typescript
 * calculateFibonacciLevels(100, 0).find((l) => l.ratio === 0.618)?.price; // 38.2
 * ```
 */
export function calculateFibonacciLevels(high: number, low: number): FibonacciLevel[] {
  const range = high - low;
  return FIBONACCI_RATIOS.map((ratio) => ({ ratio, price: high - range * ratio }));
}

/**
 * Buys when the close sits within 2% of the 23.6%, 38.2% or 61.8% level of
 * the series' full high-low range. There is no sell side.
 */
export class FibonacciStrategy extends BaseStrategy {
  readonly name = 'Fibonacci';
  protected readonly minBars = 30;

  protected evaluate(series: EnrichedSeries): Signal {
    const { bars } = series;
    const last = bars[bars.length - 1];
    if (!last) return neutralSignal();

    let high = Number.NEGATIVE_INFINITY;
    let low = Number.POSITIVE_INFINITY;
    for (const bar of bars) {
      high = Math.max(high, bar.high);
      low = Math.min(low, bar.low);
    }

    const levels = calculateFibonacciLevels(high, low);
    const close = last.close;

    for (const ratio of SUPPORT_RATIOS) {
      const level = levels.find((candidate) => candidate.ratio === ratio);
      if (!level) continue;

      const distance = Math.abs(close - level.price) / close;
      if (distance < LEVEL_PROXIMITY) {
        return buySignal(1 - distance);
      }
    }

    return neutralSignal();
  }
}
