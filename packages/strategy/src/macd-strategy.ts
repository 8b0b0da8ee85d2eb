/**
 * MACD crossover strategy.
 *
 * @module @marketlens/strategy/macd
 */

import type { EnrichedSeries, Signal } from '@marketlens/contracts';
import { BaseStrategy, buySignal, clampStrength, lastTwo, neutralSignal, sellSignal } from './base.js';

export interface MacdStrategyOptions {
  /**
   * Clamp the crossover gap into [0, 1]. When false the raw
   * |MACD - signal| distance is reported, which scales with price.
   * @default true
   */
  normalizeStrength?: boolean;
}

/**
 * Buys when MACD crosses above its signal line on the last bar and sells on
 * the opposite cross. Strength is the gap between the two lines.
 *
 * @example
 * ```typescript
 * const strategy = new MacdStrategy();
 * strategy.generateSignals(computeIndicators(bars));
 * // { buy: true, sell: false, strength: 0.42 } on a bullish cross
 * ```
 */
export class MacdStrategy extends BaseStrategy {
  readonly name = 'MACD';
  protected readonly minBars = 2;
  private readonly normalizeStrength: boolean;

  constructor(options: MacdStrategyOptions = {}) {
    super();
    this.normalizeStrength = options.normalizeStrength ?? true;
  }

  protected evaluate(series: EnrichedSeries): Signal {
    const macd = lastTwo(series.indicators?.macd);
    const signalLine = lastTwo(series.indicators?.signalLine);
    if (!macd || !signalLine) {
      return neutralSignal();
    }

    const [prevMacd, currMacd] = macd;
    const [prevSignal, currSignal] = signalLine;
    const gap = Math.abs(currMacd - currSignal);
    const strength = this.normalizeStrength ? clampStrength(gap) : gap;

    if (prevMacd <= prevSignal && currMacd > currSignal) {
      return buySignal(strength);
    }

    if (prevMacd >= prevSignal && currMacd < currSignal) {
      return sellSignal(strength);
    }

    return neutralSignal();
  }
}
