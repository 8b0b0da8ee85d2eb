/**
 * @fileoverview Type definitions for the MarketLens logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/marketlens.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * JSON lines when true, colorized single-line output otherwise.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /** Also append to this file when set */
  filePath?: string;

  /** @default true */
  console?: boolean;

  /**
   * Send every console level to stderr, leaving stdout to command output.
   * @default false
   */
  stderr?: boolean;

  /**
   * Suppress all output. Used by tests and by library callers that have no
   * logger of their own.
   * @default false
   */
  silent?: boolean;
}

/**
 * Fields commonly attached to MarketLens log entries.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Ticker symbol, e.g. "AAPL" */
  symbol?: string;

  /** History period, e.g. "6mo" */
  period?: string;

  /** Bar interval, e.g. "1d" */
  interval?: string;

  /** Strategy name, e.g. "MACD" */
  strategy?: string;

  request_id?: string;
  component?: string;
  provider?: string;
  duration_ms?: number;
  operation?: string;
  error_code?: string;
  count?: number;
  cache?: 'hit' | 'miss';

  [key: string]: unknown;
}

/**
 * Fields a child logger stamps onto every entry.
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  strategy?: string;
  request_id?: string;
  provider?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
