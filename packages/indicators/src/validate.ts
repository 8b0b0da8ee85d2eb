/**
 * Structural checks applied to a price series before indicators are computed.
 */

import { ComputationError } from '@marketlens/contracts';
import type { PriceBar, PriceSeries } from '@marketlens/contracts';

/**
 * Tolerance for OHLC comparisons, so rounding in provider data does not
 * reject otherwise valid bars.
 */
const PRICE_EPSILON = 1e-9;

/**
 * Returns a description of the first invariant the bar violates, or
 * undefined when it is valid.
 */
export function describeBarViolation(bar: PriceBar): string | undefined {
  const prices = { open: bar.open, high: bar.high, low: bar.low, close: bar.close };
  for (const [field, value] of Object.entries(prices)) {
    if (!Number.isFinite(value) || value <= 0) {
      return `${field} must be a positive finite number, got ${value}`;
    }
  }

  if (!Number.isFinite(bar.volume) || bar.volume < 0) {
    return `volume must be a non-negative finite number, got ${bar.volume}`;
  }

  if (bar.high < Math.max(bar.open, bar.close) - PRICE_EPSILON) {
    return `high (${bar.high}) must be >= open (${bar.open}) and close (${bar.close})`;
  }

  if (bar.low > Math.min(bar.open, bar.close) + PRICE_EPSILON) {
    return `low (${bar.low}) must be <= open (${bar.open}) and close (${bar.close})`;
  }

  if (Number.isNaN(Date.parse(bar.timestamp))) {
    return `timestamp is not a valid date: ${bar.timestamp}`;
  }

  return undefined;
}

/**
 * Throws a {@link ComputationError} naming the offending index when any bar
 * is invalid or timestamps are not strictly ascending.
 */
export function validateSeries(series: PriceSeries): void {
  let previousTime = Number.NEGATIVE_INFINITY;

  series.forEach((bar, index) => {
    const violation = describeBarViolation(bar);
    if (violation) {
      throw new ComputationError(`Invalid bar[${index}]: ${violation}`, {
        stage: 'validate',
        index,
      });
    }

    const time = Date.parse(bar.timestamp);
    if (time <= previousTime) {
      throw new ComputationError(
        `Bars must be strictly ascending: bar[${index}].timestamp (${bar.timestamp}) ` +
          `is not after bar[${index - 1}]`,
        { stage: 'validate', index }
      );
    }
    previousTime = time;
  });
}
