/**
 * @fileoverview Main entry point for @marketlens/contracts.
 *
 * Exports the shared types, enums and errors used by every MarketLens package.
 *
 * @module @marketlens/contracts
 */

// Periods and intervals
export {
  Period,
  Interval,
  isValidPeriod,
  parsePeriod,
  isValidInterval,
  parseInterval,
  isIntradayInterval,
  getIntervalLabel,
} from './periods.js';

// Market data
export type { PriceBar, PriceSeries, GetSeriesParams, MarketDataProvider } from './market.js';

// Indicators
export type { IndicatorColumn, IndicatorSet, EnrichedSeries, IndicatorConfig } from './indicators.js';
export { DEFAULT_INDICATOR_CONFIG } from './indicators.js';

// Signals
export type {
  Signal,
  SignalAction,
  SignalMap,
  TradingStrategy,
  FractalKind,
  FractalPoint,
  ResistanceLevel,
  Consensus,
} from './signals.js';
export { NEUTRAL_SIGNAL, signalToAction } from './signals.js';

// Error classes and guards
export {
  MarketLensError,
  ComputationError,
  ProviderRequestError,
  ProviderRateLimitError,
  SymbolResolutionError,
  isMarketLensError,
  isComputationError,
  isProviderRequestError,
  isProviderRateLimitError,
  isSymbolResolutionError,
} from './errors.js';
