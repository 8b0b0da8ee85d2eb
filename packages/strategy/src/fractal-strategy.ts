/**
 * Fractal pattern strategy: Williams-style five-bar fractals weighted by the
 * box-counting dimension of the close series.
 *
 * @module @marketlens/strategy/fractal
 */

import type { EnrichedSeries, FractalPoint, PriceSeries, Signal } from '@marketlens/contracts';
import { BaseStrategy, buySignal, neutralSignal, sellSignal } from './base.js';

const FRACTAL_WINDOW = 5;
const SCALE_COUNT = 20;

/** How many trailing bars are searched for a fresh fractal */
const RECENT_BARS = 3;

/**
 * `count` values spaced evenly in log10 between 10^start and 10^end.
 */
function logspace(start: number, end: number, count: number): number[] {
  const step = (end - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => 10 ** (start + i * step));
}

/**
 * Slope of the least-squares line through (xs, ys).
 */
function leastSquaresSlope(xs: readonly number[], ys: readonly number[]): number {
  const n = xs.length;
  const meanX = xs.reduce((sum, x) => sum + x, 0) / n;
  const meanY = ys.reduce((sum, y) => sum + y, 0) / n;

  let covariance = 0;
  let variance = 0;
  xs.forEach((x, i) => {
    const dx = x - meanX;
    covariance += dx * ((ys[i] ?? meanY) - meanY);
    variance += dx * dx;
  });

  return covariance / variance;
}

/**
 * Box-counting dimension of a price path.
 *
 * Closes are normalized to [0, 1] and bucketed at 20 scales from 0.001 to 1;
 * the dimension is the negated slope of log(bucket count) against log(scale).
 * Returns 1 for fewer than five values, a flat series or non-finite input.
 */
export function calculateFractalDimension(closes: readonly number[]): number {
  if (closes.length < FRACTAL_WINDOW || !closes.every((close) => Number.isFinite(close))) {
    return 1;
  }

  const min = closes.reduce((acc, close) => Math.min(acc, close), Number.POSITIVE_INFINITY);
  const max = closes.reduce((acc, close) => Math.max(acc, close), Number.NEGATIVE_INFINITY);
  const range = max - min;
  if (range === 0) return 1;

  const normalized = closes.map((close) => (close - min) / range);
  const scales = logspace(-3, 0, SCALE_COUNT);
  const counts = scales.map(
    (scale) => new Set(normalized.map((value) => Math.ceil(value / scale))).size
  );

  const dimension = -leastSquaresSlope(
    scales.map((scale) => Math.log(scale)),
    counts.map((count) => Math.log(count))
  );
  return Number.isFinite(dimension) ? dimension : 1;
}

/**
 * Finds five-bar fractals. A bar is bullish when its low is strictly below
 * the lows of the two bars either side, bearish when its high is strictly
 * above their highs. One bar can be both; bullish is listed first.
 */
export function identifyFractals(bars: PriceSeries): FractalPoint[] {
  const fractals: FractalPoint[] = [];

  for (let i = 2; i < bars.length - 2; i++) {
    const window = bars.slice(i - 2, i + 3);
    const center = bars[i];
    if (!center || window.length < FRACTAL_WINDOW) continue;

    const neighbours = window.filter((_, offset) => offset !== 2);
    if (neighbours.every((bar) => bar.low > center.low)) {
      fractals.push({ index: i, kind: 'bullish' });
    }
    if (neighbours.every((bar) => bar.high < center.high)) {
      fractals.push({ index: i, kind: 'bearish' });
    }
  }

  return fractals;
}

/**
 * Buys on a bullish fractal among the last three bars, otherwise sells on a
 * bearish one. Strength is half the fractal dimension, capped at 1.
 */
export class FractalStrategy extends BaseStrategy {
  readonly name = 'Fractal';
  protected readonly minBars = FRACTAL_WINDOW;

  protected evaluate(series: EnrichedSeries): Signal {
    const { bars } = series;
    const cutoff = bars.length - RECENT_BARS;
    const recent = identifyFractals(bars).filter((fractal) => fractal.index >= cutoff);
    if (recent.length === 0) return neutralSignal();

    const dimension = calculateFractalDimension(bars.map((bar) => bar.close));
    const strength = Math.min(1, dimension / 2);

    if (recent.some((fractal) => fractal.kind === 'bullish')) {
      return buySignal(strength);
    }
    return sellSignal(strength);
  }
}
