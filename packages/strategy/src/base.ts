/**
 * Shared plumbing for the rule-based strategies.
 *
 * @module @marketlens/strategy/base
 */

import { NEUTRAL_SIGNAL } from '@marketlens/contracts';
import type { EnrichedSeries, Signal, TradingStrategy } from '@marketlens/contracts';

/**
 * Clamps a strength into [0, 1]. Non-finite values become 0.
 */
export function clampStrength(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function neutralSignal(): Signal {
  return { ...NEUTRAL_SIGNAL };
}

export function buySignal(strength: number): Signal {
  return { buy: true, sell: false, strength };
}

export function sellSignal(strength: number): Signal {
  return { buy: false, sell: true, strength };
}

/**
 * Template for strategies: series shorter than {@link minBars} get the
 * neutral signal without reaching {@link evaluate}.
 */
export abstract class BaseStrategy implements TradingStrategy {
  abstract readonly name: string;

  /** Fewest bars {@link evaluate} can work with */
  protected abstract readonly minBars: number;

  generateSignals(series: EnrichedSeries): Signal {
    if (series.bars.length < this.minBars) {
      return neutralSignal();
    }
    return this.evaluate(series);
  }

  protected abstract evaluate(series: EnrichedSeries): Signal;
}

/**
 * Last two defined values of a column, or undefined when either is missing.
 */
export function lastTwo(
  column: readonly (number | undefined)[] | undefined
): [number, number] | undefined {
  if (!column || column.length < 2) return undefined;

  const previous = column[column.length - 2];
  const current = column[column.length - 1];
  if (previous === undefined || current === undefined) return undefined;
  if (!Number.isFinite(previous) || !Number.isFinite(current)) return undefined;

  return [previous, current];
}
