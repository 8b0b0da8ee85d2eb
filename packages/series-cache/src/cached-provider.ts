/**
 * Read-through cache in front of any market-data provider.
 */

import type { GetSeriesParams, MarketDataProvider, PriceBar } from '@marketlens/contracts';
import { createChildLogger } from '@marketlens/logger';
import type { Logger } from '@marketlens/logger';
import { InflightRequests } from './inflight.js';
import { TtlCache } from './ttl-cache.js';
import type { TtlCacheOptions, TtlCacheStats } from './ttl-cache.js';

export interface CachedSeriesProviderOptions extends TtlCacheOptions {
  logger?: Logger;
}

/**
 * `${symbol}_${period}_${interval}`
 */
export function seriesCacheKey(params: GetSeriesParams): string {
  return `${params.symbol}_${params.period}_${params.interval}`;
}

/**
 * Decorates a provider with a TTL cache.
 *
 * Only non-empty series are cached. Identical requests that miss while a
 * fetch is pending share that fetch. Failures propagate and are not cached.
 *
 * @example
 * ```typescript
 * const provider = new CachedSeriesProvider(new YahooProvider(), { ttlMs: 300_000, logger });
 * await provider.getSeries({ symbol: 'AAPL', period: Period.MO6, interval: Interval.D1 });
 * ```
 */
export class CachedSeriesProvider implements MarketDataProvider {
  readonly id: string;

  private readonly cache: TtlCache<PriceBar[]>;
  private readonly inflight = new InflightRequests<PriceBar[]>();
  private readonly logger?: Logger;

  constructor(
    private readonly upstream: MarketDataProvider,
    options: CachedSeriesProviderOptions = {}
  ) {
    const { logger, ...cacheOptions } = options;
    this.id = `cached:${upstream.id}`;
    this.cache = new TtlCache<PriceBar[]>(cacheOptions);
    this.logger = logger
      ? createChildLogger(logger, { component: 'series-cache', provider: upstream.id })
      : undefined;
  }

  async getSeries(params: GetSeriesParams): Promise<PriceBar[]> {
    const key = seriesCacheKey(params);

    const cached = this.cache.get(key);
    if (cached) {
      this.logger?.debug('Series cache hit', { key, cache: 'hit', count: cached.length });
      return cached;
    }

    const { promise, shared } = this.inflight.coalesce(key, async () => {
      const bars = await this.upstream.getSeries(params);
      if (bars.length > 0) {
        this.cache.set(key, bars);
      }
      return bars;
    });

    this.logger?.debug('Series cache miss', { key, cache: 'miss', shared });
    return promise;
  }

  invalidate(params: GetSeriesParams): boolean {
    return this.cache.delete(seriesCacheKey(params));
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): TtlCacheStats & { inflight: number } {
    return { ...this.cache.getStats(), inflight: this.inflight.size };
  }
}
