/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * @module @marketlens/provider-yahoo/types
 */

import type { AxiosRequestConfig } from 'axios';
import type { Logger } from '@marketlens/logger';

/**
 * One row of the chart response after nulls are dropped, before validation.
 */
export interface YahooRawBar {
  /** ISO 8601 timestamp string */
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * The slice of an HTTP client the provider needs. An `AxiosInstance`
 * satisfies it; tests pass a stub.
 */
export interface YahooHttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Chart API root; the symbol is appended as a path segment.
   * @default 'https://query1.finance.yahoo.com/v8/finance/chart'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeout?: number;

  /** Replaces the axios instance built from baseUrl and timeout */
  httpClient?: YahooHttpClient;

  logger?: Logger;
}
