/**
 * Bollinger Bands: SMA envelope of +/- k standard deviations.
 */

import type { IndicatorColumn } from '@marketlens/contracts';
import { rollingStd, sma } from './moving-averages.js';

export interface BollingerResult {
  middleBand: IndicatorColumn;
  upperBand: IndicatorColumn;
  lowerBand: IndicatorColumn;
}

export function calculateBollingerBands(
  closes: readonly number[],
  period: number,
  stdDevMultiplier: number
): BollingerResult {
  const middleBand = sma(closes, period);
  const stdDev = rollingStd(closes, period);

  const upperBand: (number | undefined)[] = [];
  const lowerBand: (number | undefined)[] = [];

  middleBand.forEach((middle, i) => {
    const deviation = stdDev[i];
    if (middle === undefined || deviation === undefined) {
      upperBand.push(undefined);
      lowerBand.push(undefined);
      return;
    }
    upperBand.push(middle + stdDevMultiplier * deviation);
    lowerBand.push(middle - stdDevMultiplier * deviation);
  });

  return { middleBand, upperBand, lowerBand };
}
