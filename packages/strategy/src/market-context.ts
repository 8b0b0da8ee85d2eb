/**
 * Snapshot of the latest bar and its indicators.
 *
 * @module @marketlens/strategy/market-context
 */

import type { EnrichedSeries } from '@marketlens/contracts';

export type BandPosition = 'above_upper' | 'below_lower' | 'within';

export interface MarketSummary {
  timestamp: string;
  close: number;
  volume: number;
  /** Percent change from the previous close; undefined for a single bar */
  changePercent?: number;
  macd?: number;
  signalLine?: number;
  rsi?: number;
  /** Undefined while the bands are warming up or indicators are missing */
  bandPosition?: BandPosition;
}

/**
 * Summarizes the last bar of an enriched series, or returns undefined for an
 * empty one.
 */
export function summarizeMarket(series: EnrichedSeries): MarketSummary | undefined {
  const { bars, indicators } = series;
  const last = bars.length - 1;
  const bar = bars[last];
  if (!bar) return undefined;

  const previous = bars[last - 1];
  const upper = indicators?.upperBand[last];
  const lower = indicators?.lowerBand[last];

  let bandPosition: BandPosition | undefined;
  if (upper !== undefined && lower !== undefined) {
    if (bar.close > upper) bandPosition = 'above_upper';
    else if (bar.close < lower) bandPosition = 'below_lower';
    else bandPosition = 'within';
  }

  return {
    timestamp: bar.timestamp,
    close: bar.close,
    volume: bar.volume,
    changePercent: previous ? ((bar.close - previous.close) * 100) / previous.close : undefined,
    macd: indicators?.macd[last],
    signalLine: indicators?.signalLine[last],
    rsi: indicators?.rsi[last],
    bandPosition,
  };
}
