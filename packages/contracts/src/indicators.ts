/**
 * @fileoverview Indicator column types.
 *
 * Indicators are stored column-wise, aligned 1:1 with the bars of the series
 * they were computed from. `undefined` marks warm-up positions where the
 * rolling window does not yet have enough history.
 *
 * @module @marketlens/contracts/indicators
 */

import type { PriceSeries } from './market.js';

/**
 * One derived value per bar; `undefined` during warm-up.
 */
export type IndicatorColumn = readonly (number | undefined)[];

/**
 * Derived columns appended to a price series.
 *
 * @invariant Every column has the same length as the source series
 * @invariant upperBand >= middleBand >= lowerBand wherever defined
 * @invariant 0 <= rsi <= 100 wherever defined
 */
export interface IndicatorSet {
  /** EMA(close, fast) - EMA(close, slow) */
  macd: IndicatorColumn;

  /** EMA(macd, signal) */
  signalLine: IndicatorColumn;

  /** SMA(close, period) */
  middleBand: IndicatorColumn;

  /** middleBand + k * stddev */
  upperBand: IndicatorColumn;

  /** middleBand - k * stddev */
  lowerBand: IndicatorColumn;

  /** Relative Strength Index, 0-100 */
  rsi: IndicatorColumn;
}

/**
 * A price series together with its indicator columns.
 *
 * `indicators` is absent when computation failed and the engine degraded to
 * returning the raw series.
 */
export interface EnrichedSeries {
  readonly bars: PriceSeries;
  readonly indicators?: IndicatorSet;
}

/**
 * Window lengths and multipliers used by the indicator engine.
 */
export interface IndicatorConfig {
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  bollingerPeriod: number;
  bollingerStdDev: number;
  rsiPeriod: number;
}

/**
 * Classic parameters: MACD(12, 26, 9), Bollinger(20, 2), RSI(14).
 */
export const DEFAULT_INDICATOR_CONFIG: Readonly<IndicatorConfig> = {
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  bollingerPeriod: 20,
  bollingerStdDev: 2,
  rsiPeriod: 14,
};
