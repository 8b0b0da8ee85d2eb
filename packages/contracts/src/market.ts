/**
 * @fileoverview Market data types and provider contract.
 *
 * Provider-agnostic shapes for OHLCV bars and history queries. Pure data
 * structures with no I/O.
 *
 * @module @marketlens/contracts/market
 */

import type { Interval, Period } from './periods.js';

/**
 * A single OHLCV bar.
 *
 * @invariant open, high, low, close > 0
 * @invariant high >= max(open, close)
 * @invariant low <= min(open, close)
 * @invariant volume >= 0
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: '2025-01-15T14:30:00.000Z',
 *   open: 182.5,
 *   high: 184.1,
 *   low: 181.9,
 *   close: 183.7,
 *   volume: 51234000
 * };
 * ```
 */
export interface PriceBar {
  /** ISO 8601 timestamp of bar open (UTC) */
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Bars ordered ascending by timestamp, no duplicate timestamps.
 *
 * Created once per fetch and never mutated; derived data lives beside it in
 * an {@link EnrichedSeries}.
 */
export type PriceSeries = readonly PriceBar[];

/**
 * Query for a symbol's price history.
 *
 * @example
 * ```typescript
 * const params: GetSeriesParams = {
 *   symbol: 'AAPL',
 *   period: Period.MO6,
 *   interval: Interval.D1
 * };
 * ```
 */
export interface GetSeriesParams {
  /** Ticker symbol as understood by the provider (e.g. 'AAPL', 'BRK-B') */
  symbol: string;

  /** How much history to fetch, counted back from now */
  period: Period;

  /** Duration of each bar */
  interval: Interval;
}

/**
 * Source of price history.
 *
 * Implementations may return an empty array when the provider has no data for
 * the requested window; consumers must handle zero-length series.
 */
export interface MarketDataProvider {
  /** Stable provider identifier used in logs and cache keys */
  readonly id: string;

  getSeries(params: GetSeriesParams): Promise<PriceBar[]>;
}
