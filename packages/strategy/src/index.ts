/**
 * @marketlens/strategy
 *
 * Rule-based strategies over enriched price series, plus the aggregation
 * helpers that combine their signals.
 */

export { BaseStrategy, clampStrength, neutralSignal, buySignal, sellSignal } from './base.js';

export { MacdStrategy } from './macd-strategy.js';
export type { MacdStrategyOptions } from './macd-strategy.js';

export { BollingerStrategy, BAND_PROXIMITY } from './bollinger-strategy.js';

export {
  FibonacciStrategy,
  FIBONACCI_RATIOS,
  calculateFibonacciLevels,
} from './fibonacci-strategy.js';
export type { FibonacciLevel } from './fibonacci-strategy.js';

export {
  FractalStrategy,
  calculateFractalDimension,
  identifyFractals,
} from './fractal-strategy.js';

export {
  ResistanceStrategy,
  RESISTANCE_WINDOW,
  identifyResistanceLevels,
  calculateResistanceStrength,
  rankResistanceLevels,
} from './resistance-strategy.js';

export { createDefaultStrategies, generateAllSignals } from './registry.js';
export type { DefaultStrategyOptions } from './registry.js';

export { buildConsensus } from './consensus.js';
export type { StrategyWeights } from './consensus.js';

export { summarizeMarket } from './market-context.js';
export type { MarketSummary, BandPosition } from './market-context.js';
