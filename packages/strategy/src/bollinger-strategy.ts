/**
 * Bollinger Bands mean-reversion strategy.
 *
 * @module @marketlens/strategy/bollinger
 */

import type { EnrichedSeries, Signal } from '@marketlens/contracts';
import { BaseStrategy, buySignal, clampStrength, neutralSignal, sellSignal } from './base.js';

/** Relative distance to a band that counts as touching it */
export const BAND_PROXIMITY = 0.02;

/**
 * Buys near the lower band, sells near the upper band. The lower band takes
 * precedence when both are within reach.
 */
export class BollingerStrategy extends BaseStrategy {
  readonly name = 'Bollinger Bands';
  protected readonly minBars = 20;

  protected evaluate(series: EnrichedSeries): Signal {
    const last = series.bars.length - 1;
    const bar = series.bars[last];
    const lower = series.indicators?.lowerBand[last];
    const upper = series.indicators?.upperBand[last];

    if (!bar || lower === undefined || upper === undefined) {
      return neutralSignal();
    }

    const close = bar.close;
    const lowerDistance = (close - lower) / lower;
    const upperDistance = (upper - close) / close;

    if (Number.isFinite(lowerDistance) && lowerDistance < BAND_PROXIMITY) {
      return buySignal(clampStrength(1 - lowerDistance));
    }

    if (Number.isFinite(upperDistance) && upperDistance < BAND_PROXIMITY) {
      return sellSignal(clampStrength(1 - upperDistance));
    }

    return neutralSignal();
  }
}
