import type { EnrichedSeries, IndicatorSet, PriceBar } from '@marketlens/contracts';

const DAY_MS = 86_400_000;
const START = Date.UTC(2025, 0, 2);

export interface BarFields {
  close: number;
  open?: number;
  high?: number;
  low?: number;
  volume?: number;
}

/**
 * A bar at `index` days after the fixture start. Open defaults to close,
 * high/low to 1% either side.
 */
export function makeBar(index: number, fields: BarFields): PriceBar {
  const { close } = fields;
  return {
    timestamp: new Date(START + index * DAY_MS).toISOString(),
    open: fields.open ?? close,
    high: fields.high ?? close * 1.01,
    low: fields.low ?? close * 0.99,
    close,
    volume: fields.volume ?? 1_000_000,
  };
}

export function barsFromCloses(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => makeBar(i, { close }));
}

export function flatBars(count: number, close = 100): PriceBar[] {
  return barsFromCloses(Array.from({ length: count }, () => close));
}

export function wavyCloses(count: number, base = 100): number[] {
  return Array.from({ length: count }, (_, i) => base + i * 0.3 + 5 * Math.sin(i / 3));
}

/**
 * Enriched series with hand-picked indicator columns; omitted columns are
 * all undefined.
 */
export function withIndicators(
  bars: readonly PriceBar[],
  columns: Partial<IndicatorSet>
): EnrichedSeries {
  const empty = bars.map(() => undefined);
  return {
    bars,
    indicators: {
      macd: columns.macd ?? empty,
      signalLine: columns.signalLine ?? empty,
      middleBand: columns.middleBand ?? empty,
      upperBand: columns.upperBand ?? empty,
      lowerBand: columns.lowerBand ?? empty,
      rsi: columns.rsi ?? empty,
    },
  };
}
