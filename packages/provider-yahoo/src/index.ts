/**
 * @fileoverview Public API for @marketlens/provider-yahoo.
 *
 * @module @marketlens/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@marketlens/provider-yahoo';
 * import { Interval, Period } from '@marketlens/contracts';
 *
 * const provider = new YahooProvider();
 * const bars = await provider.getSeries({
 *   symbol: 'MSFT',
 *   period: Period.Y1,
 *   interval: Interval.D1
 * });
 * ```
 */

export { YahooProvider, YAHOO_BASE_URL, DEFAULT_TIMEOUT_MS } from './yahoo-provider.js';

export {
  chartResponseSchema,
  parseYahooBar,
  parseYahooBars,
  parseChartResult,
  extractRawBars,
  normalizeBars,
} from './parser.js';

export type { YahooRawBar, YahooHttpClient, YahooProviderOptions } from './types.js';
export type { ParseResult, ParseError, YahooChartResponse, YahooChartResult } from './parser.js';
