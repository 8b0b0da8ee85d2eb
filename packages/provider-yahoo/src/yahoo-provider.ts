/**
 * @fileoverview Yahoo Finance data provider implementation.
 *
 * Fetches daily and intraday history from the public chart API and converts
 * it into validated, ascending PriceBar arrays.
 *
 * @module @marketlens/provider-yahoo
 */

import axios from 'axios';
import {
  ProviderRateLimitError,
  ProviderRequestError,
  SymbolResolutionError,
  isMarketLensError,
  isValidInterval,
  isValidPeriod,
} from '@marketlens/contracts';
import type {
  GetSeriesParams,
  MarketDataProvider,
  MarketLensError,
  PriceBar,
} from '@marketlens/contracts';
import { createChildLogger, startTimer } from '@marketlens/logger';
import type { Logger } from '@marketlens/logger';
import { chartResponseSchema, parseChartResult } from './parser.js';
import type { YahooHttpClient, YahooProviderOptions } from './types.js';

export const YAHOO_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
export const DEFAULT_TIMEOUT_MS = 10_000;

const PROVIDER_ID = 'yahoo';

/** Tickers, indices (^GSPC), share classes (BRK-B), FX (EURUSD=X) */
const SYMBOL_PATTERN = /^[A-Z0-9.^=-]{1,20}$/;

/** How many invalid bars are echoed into the warning log */
const MAX_LOGGED_PARSE_ERRORS = 5;

function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Yahoo Finance data provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ timeout: 5000, logger });
 * const bars = await provider.getSeries({
 *   symbol: 'AAPL',
 *   period: Period.MO6,
 *   interval: Interval.D1
 * });
 * ```
 */
export class YahooProvider implements MarketDataProvider {
  readonly id = PROVIDER_ID;

  private readonly http: YahooHttpClient;
  private readonly logger?: Logger;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_BASE_URL,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      });
    this.logger = options.logger
      ? createChildLogger(options.logger, { component: 'provider', provider: PROVIDER_ID })
      : undefined;
  }

  /**
   * Fetches the price history for one symbol.
   *
   * Rows with missing prices are skipped and rows that violate bar
   * invariants are dropped with a warning. An unknown window yields `[]`.
   *
   * @throws {Error} If symbol, period or interval is invalid (no request is made)
   * @throws {ProviderRateLimitError} On HTTP 429
   * @throws {SymbolResolutionError} On HTTP 404 or a "Not Found" chart error
   * @throws {ProviderRequestError} On any other transport or payload failure
   */
  async getSeries(params: GetSeriesParams): Promise<PriceBar[]> {
    const symbol = this.validateParams(params);
    const timer = startTimer();

    this.logger?.debug('Fetching series', {
      symbol,
      period: params.period,
      interval: params.interval,
    });

    let payload: unknown;
    try {
      const response = await this.http.get(`/${encodeURIComponent(symbol)}`, {
        params: {
          range: params.period,
          interval: params.interval,
          includePrePost: false,
          events: 'div,splits',
        },
      });
      payload = response.data;
    } catch (error) {
      const mapped = this.mapRequestError(error, symbol);
      this.logger?.error('Yahoo request failed', {
        symbol,
        error_code: mapped.code,
        error: mapped.message,
        duration_ms: timer.stop(),
      });
      throw mapped;
    }

    const parsed = chartResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProviderRequestError(
        `Malformed Yahoo chart response for ${symbol}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown shape'}`,
        { provider: PROVIDER_ID, symbol }
      );
    }

    const { chart } = parsed.data;
    if (chart.error) {
      const description = chart.error.description ?? chart.error.code;
      if (chart.error.code === 'Not Found') {
        throw new SymbolResolutionError(`Symbol "${symbol}" not found: ${description}`, {
          symbol,
          provider: PROVIDER_ID,
        });
      }
      throw new ProviderRequestError(`Yahoo chart error for ${symbol}: ${description}`, {
        provider: PROVIDER_ID,
        symbol,
        chartError: chart.error.code,
      });
    }

    const result = chart.result?.[0];
    if (!result) {
      this.logger?.info('No data returned', { symbol, count: 0, duration_ms: timer.stop() });
      return [];
    }

    const { bars, errors } = parseChartResult(result);
    if (errors.length > 0) {
      this.logger?.warn('Skipped invalid Yahoo bars', {
        symbol,
        count: errors.length,
        errors: errors.slice(0, MAX_LOGGED_PARSE_ERRORS).map((e) => `${e.bar.date}: ${e.reason}`),
      });
    }

    this.logger?.info('Series fetched', {
      symbol,
      period: params.period,
      interval: params.interval,
      count: bars.length,
      duration_ms: timer.stop(),
    });

    return bars;
  }

  /**
   * Validates getSeries parameters and returns the normalized symbol.
   */
  private validateParams(params: GetSeriesParams): string {
    const symbol = typeof params.symbol === 'string' ? params.symbol.trim().toUpperCase() : '';
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new Error(`Invalid symbol: "${params.symbol}"`);
    }

    if (!isValidPeriod(params.period)) {
      throw new Error(`Invalid period: ${params.period}`);
    }

    if (!isValidInterval(params.interval)) {
      throw new Error(`Invalid interval: ${params.interval}`);
    }

    return symbol;
  }

  private mapRequestError(error: unknown, symbol: string): MarketLensError {
    if (isMarketLensError(error)) return error;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      if (status === 429) {
        const retryAfter = parseRetryAfter(error.response?.headers['retry-after']);
        return new ProviderRateLimitError(`Yahoo rate limit exceeded for ${symbol}`, {
          provider: PROVIDER_ID,
          retryAfter,
        });
      }

      if (status === 404) {
        return new SymbolResolutionError(`Symbol "${symbol}" not found`, {
          symbol,
          provider: PROVIDER_ID,
        });
      }

      return new ProviderRequestError(`Yahoo request failed for ${symbol}: ${error.message}`, {
        provider: PROVIDER_ID,
        symbol,
        status,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderRequestError(`Yahoo request failed for ${symbol}: ${message}`, {
      provider: PROVIDER_ID,
      symbol,
    });
  }
}
