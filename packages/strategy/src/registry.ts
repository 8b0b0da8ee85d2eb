/**
 * Strategy registry and signal fan-out.
 *
 * @module @marketlens/strategy/registry
 */

import { MarketLensError } from '@marketlens/contracts';
import type { EnrichedSeries, SignalMap, TradingStrategy } from '@marketlens/contracts';
import type { Logger } from '@marketlens/logger';
import { neutralSignal } from './base.js';
import { BollingerStrategy } from './bollinger-strategy.js';
import { FibonacciStrategy } from './fibonacci-strategy.js';
import { FractalStrategy } from './fractal-strategy.js';
import { MacdStrategy } from './macd-strategy.js';
import type { MacdStrategyOptions } from './macd-strategy.js';
import { ResistanceStrategy } from './resistance-strategy.js';

export interface DefaultStrategyOptions {
  /** Keep only strategies with these names, in default order */
  include?: readonly string[];
  macd?: MacdStrategyOptions;
}

/**
 * The five built-in strategies: MACD, Bollinger Bands, Fibonacci, Fractal,
 * Resistance.
 */
export function createDefaultStrategies(options: DefaultStrategyOptions = {}): TradingStrategy[] {
  const strategies: TradingStrategy[] = [
    new MacdStrategy(options.macd),
    new BollingerStrategy(),
    new FibonacciStrategy(),
    new FractalStrategy(),
    new ResistanceStrategy(),
  ];

  const { include } = options;
  if (!include) return strategies;

  const unknown = include.filter((name) => !strategies.some((s) => s.name === name));
  if (unknown.length > 0) {
    throw new MarketLensError('UNKNOWN_STRATEGY', `Unknown strategy: ${unknown.join(', ')}`, {
      unknown,
      available: strategies.map((s) => s.name),
    });
  }

  return strategies.filter((strategy) => include.includes(strategy.name));
}

/**
 * Runs every strategy over the same enriched series.
 *
 * A strategy that throws is logged and recorded as neutral so one faulty
 * rule cannot hide the others.
 *
 * @throws {MarketLensError} DUPLICATE_STRATEGY when two strategies share a name
 *
 * @example
 * ```typescript
 * const signals = generateAllSignals(computeIndicators(bars), createDefaultStrategies(), logger);
 * signals['MACD']; // { buy: false, sell: true, strength: 0.12 }
 * ```
 */
export function generateAllSignals(
  series: EnrichedSeries,
  strategies: readonly TradingStrategy[],
  logger?: Logger
): SignalMap {
  const seen = new Set<string>();
  for (const strategy of strategies) {
    if (seen.has(strategy.name)) {
      throw new MarketLensError(
        'DUPLICATE_STRATEGY',
        `Strategy "${strategy.name}" registered twice`,
        { name: strategy.name }
      );
    }
    seen.add(strategy.name);
  }

  const signals: SignalMap = {};
  for (const strategy of strategies) {
    try {
      signals[strategy.name] = strategy.generateSignals(series);
    } catch (error) {
      logger?.error('Strategy failed, recording neutral signal', {
        strategy: strategy.name,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
        count: series.bars.length,
      });
      signals[strategy.name] = neutralSignal();
    }
  }

  return signals;
}
