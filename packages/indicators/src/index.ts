/**
 * @marketlens/indicators
 *
 * Technical indicators over OHLCV series. All functions are pure and never
 * mutate their input.
 */

export { computeIndicators, resolveIndicatorConfig } from './engine.js';
export type { ComputeIndicatorsOptions, FailureMode } from './engine.js';

export { ema, sma, rollingStd } from './moving-averages.js';
export { calculateMacd } from './macd.js';
export type { MacdResult } from './macd.js';
export { calculateBollingerBands } from './bollinger.js';
export type { BollingerResult } from './bollinger.js';
export { calculateRsi } from './rsi.js';
export { validateSeries, describeBarViolation } from './validate.js';
