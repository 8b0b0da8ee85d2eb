/**
 * Moving Average Convergence Divergence.
 */

import { ema, subtract } from './moving-averages.js';

export interface MacdResult {
  /** EMA(close, fast) - EMA(close, slow) */
  macd: number[];
  /** EMA(macd, signal) */
  signalLine: number[];
}

/**
 * Computes the MACD line and its signal line from closing prices.
 *
 * Both columns are defined at every index because the EMAs are seeded from
 * the first close.
 */
export function calculateMacd(
  closes: readonly number[],
  fast: number,
  slow: number,
  signal: number
): MacdResult {
  const macd = subtract(ema(closes, fast), ema(closes, slow));
  return { macd, signalLine: ema(macd, signal) };
}
