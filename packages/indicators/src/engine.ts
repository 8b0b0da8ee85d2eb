/**
 * Indicator engine: turns a price series into an enriched series carrying
 * MACD, Bollinger Bands and RSI columns.
 */

import {
  ComputationError,
  DEFAULT_INDICATOR_CONFIG,
  isMarketLensError,
} from '@marketlens/contracts';
import type {
  EnrichedSeries,
  IndicatorConfig,
  IndicatorSet,
  PriceSeries,
} from '@marketlens/contracts';
import type { Logger } from '@marketlens/logger';
import { calculateBollingerBands } from './bollinger.js';
import { calculateMacd } from './macd.js';
import { calculateRsi } from './rsi.js';
import { validateSeries } from './validate.js';

/**
 * What to do when the series cannot be enriched.
 *
 * - `degrade`: log a warning and return the bars without indicators
 * - `throw`: raise a {@link ComputationError}
 */
export type FailureMode = 'degrade' | 'throw';

export interface ComputeIndicatorsOptions {
  /** @default 'degrade' */
  failureMode?: FailureMode;
  /** Overrides for individual window lengths */
  config?: Partial<IndicatorConfig>;
  logger?: Logger;
}

const INTEGER_FIELDS = [
  'macdFast',
  'macdSlow',
  'macdSignal',
  'bollingerPeriod',
  'rsiPeriod',
] as const;

/**
 * Merges overrides onto the defaults and rejects non-positive windows.
 */
export function resolveIndicatorConfig(overrides: Partial<IndicatorConfig> = {}): IndicatorConfig {
  const config: IndicatorConfig = { ...DEFAULT_INDICATOR_CONFIG, ...overrides };

  for (const field of INTEGER_FIELDS) {
    const value = config[field];
    if (!Number.isInteger(value) || value < 1) {
      throw new ComputationError(`${field} must be a positive integer, got ${value}`, {
        stage: 'config',
        field,
      });
    }
  }

  if (!Number.isFinite(config.bollingerStdDev) || config.bollingerStdDev <= 0) {
    throw new ComputationError(
      `bollingerStdDev must be a positive number, got ${config.bollingerStdDev}`,
      { stage: 'config', field: 'bollingerStdDev' }
    );
  }

  return config;
}

function emptyIndicatorSet(): IndicatorSet {
  return { macd: [], signalLine: [], middleBand: [], upperBand: [], lowerBand: [], rsi: [] };
}

function toComputationError(error: unknown): ComputationError {
  if (error instanceof ComputationError) return error;

  const message = error instanceof Error ? error.message : String(error);
  return new ComputationError(`Indicator computation failed: ${message}`, {
    stage: 'compute',
    cause: isMarketLensError(error) ? error.code : undefined,
  });
}

/**
 * Computes every indicator column for `series`.
 *
 * The input is never mutated; the returned object references the same bars.
 * An empty series yields empty columns.
 *
 * @example
 * ```typescript
 * const enriched = computeIndicators(bars, { logger });
 * if (enriched.indicators) {
 *   const lastRsi = enriched.indicators.rsi[bars.length - 1];
 * }
 * ```
 *
 * @throws {ComputationError} in `throw` mode when the series or config is invalid
 */
export function computeIndicators(
  series: PriceSeries,
  options: ComputeIndicatorsOptions = {}
): EnrichedSeries {
  const { failureMode = 'degrade', logger } = options;

  try {
    const config = resolveIndicatorConfig(options.config);

    if (series.length === 0) {
      return { bars: series, indicators: emptyIndicatorSet() };
    }

    validateSeries(series);

    const closes = series.map((bar) => bar.close);
    const { macd, signalLine } = calculateMacd(
      closes,
      config.macdFast,
      config.macdSlow,
      config.macdSignal
    );
    const bands = calculateBollingerBands(closes, config.bollingerPeriod, config.bollingerStdDev);
    const rsi = calculateRsi(closes, config.rsiPeriod);

    return {
      bars: series,
      indicators: { macd, signalLine, ...bands, rsi },
    };
  } catch (error) {
    const computationError = toComputationError(error);

    if (failureMode === 'throw') {
      throw computationError;
    }

    logger?.warn('Indicator computation failed, returning raw series', {
      error_code: computationError.code,
      error: computationError.message,
      stage: computationError.data?.['stage'],
      count: series.length,
    });
    return { bars: series };
  }
}
