/**
 * @fileoverview Parser utilities for Yahoo Finance chart responses.
 *
 * Validates the response shape with zod, then converts the column-wise quote
 * arrays into PriceBar rows.
 *
 * @module @marketlens/provider-yahoo/parser
 */

import { z } from 'zod';
import type { PriceBar } from '@marketlens/contracts';
import type { YahooRawBar } from './types.js';

const nullableNumbers = z.array(z.number().nullable());

const quoteSchema = z.object({
  open: nullableNumbers.optional(),
  high: nullableNumbers.optional(),
  low: nullableNumbers.optional(),
  close: nullableNumbers.optional(),
  volume: nullableNumbers.optional(),
});

const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string().optional(),
      currency: z.string().nullable().optional(),
      exchangeTimezoneName: z.string().optional(),
    })
    .passthrough()
    .optional(),
  timestamp: z.array(z.number()).optional(),
  indicators: z
    .object({
      quote: z.array(quoteSchema).optional(),
    })
    .optional(),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable().optional(),
    error: z
      .object({
        code: z.string(),
        description: z.string().nullable().optional(),
      })
      .nullable()
      .optional(),
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;
export type YahooChartResult = z.infer<typeof chartResultSchema>;

/**
 * Parses a single raw Yahoo Finance bar into PriceBar format.
 *
 * @throws {Error} If the bar violates a price, volume or timestamp invariant
 *
 * @example
 * ```typescript
 * const bar = parseYahooBar({
 *   date: '2025-01-15T14:30:00.000Z',
 *   open: 182.5,
 *   high: 184.1,
 *   low: 181.9,
 *   close: 183.7,
 *   volume: 51234000
 * });
 * ```
 */
export function parseYahooBar(raw: YahooRawBar): PriceBar {
  const prices = [raw.open, raw.high, raw.low, raw.close];
  if (prices.some((price) => !Number.isFinite(price) || price <= 0)) {
    throw new Error('Yahoo bar has invalid OHLC data');
  }
  if (!Number.isFinite(raw.volume) || raw.volume < 0) {
    throw new Error('Yahoo bar has invalid volume');
  }

  if (raw.high < raw.low) {
    throw new Error(`Invalid bar: high (${raw.high}) < low (${raw.low})`);
  }
  if (raw.high < raw.open || raw.high < raw.close) {
    throw new Error(`Invalid bar: high (${raw.high}) < open/close`);
  }
  if (raw.low > raw.open || raw.low > raw.close) {
    throw new Error(`Invalid bar: low (${raw.low}) > open/close`);
  }

  if (Number.isNaN(Date.parse(raw.date))) {
    throw new Error(`Invalid timestamp: ${raw.date}`);
  }

  return {
    timestamp: raw.date,
    open: raw.open,
    high: raw.high,
    low: raw.low,
    close: raw.close,
    volume: raw.volume,
  };
}

export interface ParseError {
  bar: YahooRawBar;
  reason: string;
}

/**
 * Result of parsing Yahoo Finance bars.
 */
export interface ParseResult {
  bars: PriceBar[];
  errors: ParseError[];
}

/**
 * Parses raw bars, collecting failures instead of throwing.
 */
export function parseYahooBars(rawBars: readonly YahooRawBar[]): ParseResult {
  const bars: PriceBar[] = [];
  const errors: ParseError[] = [];

  for (const raw of rawBars) {
    try {
      bars.push(parseYahooBar(raw));
    } catch (error) {
      errors.push({ bar: raw, reason: error instanceof Error ? error.message : String(error) });
    }
  }

  return { bars, errors };
}

/**
 * Zips the timestamp and quote columns of a chart result into raw rows.
 * Rows missing any of open, high, low or close are dropped; a missing volume
 * counts as zero.
 */
export function extractRawBars(result: YahooChartResult): YahooRawBar[] {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators?.quote?.[0];
  if (!quote) return [];

  const rows: YahooRawBar[] = [];
  timestamps.forEach((seconds, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];

    if (open == null || high == null || low == null || close == null) {
      return;
    }

    rows.push({
      date: new Date(seconds * 1000).toISOString(),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  return rows;
}

/**
 * Sorts bars ascending by timestamp; for duplicate timestamps the last one
 * in the input wins.
 */
export function normalizeBars(bars: readonly PriceBar[]): PriceBar[] {
  const byTimestamp = new Map<string, PriceBar>();
  for (const bar of bars) {
    byTimestamp.set(bar.timestamp, bar);
  }
  return [...byTimestamp.values()].sort(
    (a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp)
  );
}

/**
 * Full pipeline for one chart result: extract, validate, sort, de-duplicate.
 */
export function parseChartResult(result: YahooChartResult): ParseResult {
  const { bars, errors } = parseYahooBars(extractRawBars(result));
  return { bars: normalizeBars(bars), errors };
}
