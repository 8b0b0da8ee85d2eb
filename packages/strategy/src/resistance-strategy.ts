/**
 * Resistance level strategy.
 *
 * @module @marketlens/strategy/resistance
 */

import type { EnrichedSeries, PriceSeries, ResistanceLevel, Signal } from '@marketlens/contracts';
import { BaseStrategy, buySignal, clampStrength, neutralSignal, sellSignal } from './base.js';

export const RESISTANCE_WINDOW = 20;

/** A high within this fraction of a level counts as a test of it */
const TEST_TOLERANCE = 0.01;
const STRENGTH_PER_TEST = 0.2;

/** Gap to the next level beyond which price has room to run */
const ROOM_TO_RUN = 0.1;

/** Confidence reported when nothing caps the current price */
const OPEN_SKY_STRENGTH = 0.8;

/**
 * Highs that are the maximum of a centred window around themselves and
 * strictly above at least one other high in it, so a flat stretch is not a
 * level.
 *
 * The window for bar `i` spans `[i - window/2, i + window/2 - 1]`; only bars
 * at least `window` away from either end are considered.
 *
 * @returns Distinct level prices, ascending
 */
export function identifyResistanceLevels(
  bars: PriceSeries,
  window: number = RESISTANCE_WINDOW
): number[] {
  const before = Math.floor(window / 2);
  const levels = new Set<number>();

  for (let i = window; i < bars.length - window; i++) {
    const bar = bars[i];
    if (!bar) continue;

    let windowHigh = Number.NEGATIVE_INFINITY;
    let windowLowestHigh = Number.POSITIVE_INFINITY;
    for (let j = i - before; j < i - before + window; j++) {
      const high = bars[j]?.high;
      if (high === undefined) continue;
      windowHigh = Math.max(windowHigh, high);
      windowLowestHigh = Math.min(windowLowestHigh, high);
    }

    if (bar.high === windowHigh && windowLowestHigh < windowHigh) {
      levels.add(bar.high);
    }
  }

  return [...levels].sort((a, b) => a - b);
}

/**
 * How strongly `level` is expected to cap `price`: 0.2 per historical test,
 * scaled down by the relative distance from price, clamped to [0, 1].
 */
export function calculateResistanceStrength(
  price: number,
  level: number,
  bars: PriceSeries
): number {
  const tests = bars.filter((bar) => Math.abs(bar.high - level) / level < TEST_TOLERANCE).length;
  const proximity = Math.abs(price - level) / level;
  return clampStrength(tests * STRENGTH_PER_TEST * (1 - proximity));
}

/**
 * Every resistance level of the series with its strength relative to `price`.
 *
 * @example
 * ```typescript
 * rankResistanceLevels(bars, 182.4);
 * // [{ price: 185.1, strength: 0.39 }, { price: 191.7, strength: 0.19 }]
 * ```
 */
export function rankResistanceLevels(
  bars: PriceSeries,
  price: number,
  window: number = RESISTANCE_WINDOW
): ResistanceLevel[] {
  return identifyResistanceLevels(bars, window).map((level) => ({
    price: level,
    strength: calculateResistanceStrength(price, level, bars),
  }));
}

/**
 * Looks at the nearest resistance above the close. Far away (more than 10%)
 * it buys, discounted by the level's strength; close by it sells with that
 * strength. With nothing overhead it buys at 0.8.
 */
export class ResistanceStrategy extends BaseStrategy {
  readonly name = 'Resistance';
  protected readonly minBars = RESISTANCE_WINDOW * 2;

  protected evaluate(series: EnrichedSeries): Signal {
    const { bars } = series;
    const last = bars[bars.length - 1];
    if (!last) return neutralSignal();

    const price = last.close;
    const nearest = identifyResistanceLevels(bars).find((level) => level > price);

    if (nearest === undefined) {
      return buySignal(OPEN_SKY_STRENGTH);
    }

    const strength = calculateResistanceStrength(price, nearest, bars);
    const gap = (nearest - price) / price;

    if (gap > ROOM_TO_RUN) {
      return buySignal(1 - strength);
    }
    return sellSignal(strength);
  }
}
