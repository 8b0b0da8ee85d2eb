/**
 * @fileoverview History period and bar interval enumerations.
 *
 * Values match the range/interval vocabulary of the chart API the market-data
 * provider talks to, so they can be passed through without translation.
 *
 * @module @marketlens/contracts/periods
 */

/**
 * Length of price history to request, counted back from now.
 */
export enum Period {
  D1 = '1d',
  D5 = '5d',
  MO1 = '1mo',
  MO3 = '3mo',
  MO6 = '6mo',
  Y1 = '1y',
  Y2 = '2y',
  Y5 = '5y',
  Y10 = '10y',
  YTD = 'ytd',
  MAX = 'max',
}

/**
 * Duration of a single bar.
 *
 * @invariant Members are declared from shortest to longest duration
 */
export enum Interval {
  M1 = '1m',
  M2 = '2m',
  M5 = '5m',
  M15 = '15m',
  M30 = '30m',
  M60 = '60m',
  M90 = '90m',
  H1 = '1h',
  D1 = '1d',
  D5 = '5d',
  WK1 = '1wk',
  MO1 = '1mo',
  MO3 = '3mo',
}

const INTRADAY_INTERVALS: ReadonlySet<Interval> = new Set([
  Interval.M1,
  Interval.M2,
  Interval.M5,
  Interval.M15,
  Interval.M30,
  Interval.M60,
  Interval.M90,
  Interval.H1,
]);

const INTERVAL_LABELS: Record<Interval, string> = {
  [Interval.M1]: '1 Minute',
  [Interval.M2]: '2 Minutes',
  [Interval.M5]: '5 Minutes',
  [Interval.M15]: '15 Minutes',
  [Interval.M30]: '30 Minutes',
  [Interval.M60]: '60 Minutes',
  [Interval.M90]: '90 Minutes',
  [Interval.H1]: '1 Hour',
  [Interval.D1]: 'Daily',
  [Interval.D5]: '5 Days',
  [Interval.WK1]: 'Weekly',
  [Interval.MO1]: 'Monthly',
  [Interval.MO3]: 'Quarterly',
};

const PERIOD_VALUES: readonly string[] = Object.values(Period);
const INTERVAL_VALUES: readonly string[] = Object.values(Interval);

/**
 * @example
 * ```typescript
 * isValidPeriod('6mo')  // true
 * isValidPeriod('7mo')  // false
 * ```
 */
export function isValidPeriod(value: string): value is Period {
  return PERIOD_VALUES.includes(value);
}

/**
 * Parses a string into a Period, throwing if invalid.
 *
 * @throws {Error} If value is not a supported period
 */
export function parsePeriod(value: string): Period {
  if (!isValidPeriod(value)) {
    throw new Error(`Invalid period: ${value}. Must be one of: ${PERIOD_VALUES.join(', ')}`);
  }
  return value;
}

export function isValidInterval(value: string): value is Interval {
  return INTERVAL_VALUES.includes(value);
}

/**
 * Parses a string into an Interval, throwing if invalid.
 *
 * @throws {Error} If value is not a supported interval
 */
export function parseInterval(value: string): Interval {
  if (!isValidInterval(value)) {
    throw new Error(`Invalid interval: ${value}. Must be one of: ${INTERVAL_VALUES.join(', ')}`);
  }
  return value;
}

/**
 * True for intervals shorter than one trading day.
 */
export function isIntradayInterval(interval: Interval): boolean {
  return INTRADAY_INTERVALS.has(interval);
}

/**
 * Gets human-readable label for an interval.
 *
 * @example
 * ```typescript
 * getIntervalLabel(Interval.D1)   // 'Daily'
 * getIntervalLabel(Interval.M15)  // '15 Minutes'
 * ```
 */
export function getIntervalLabel(interval: Interval): string {
  return INTERVAL_LABELS[interval];
}
