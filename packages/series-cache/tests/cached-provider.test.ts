/**
 * @fileoverview Tests for CachedSeriesProvider against an in-memory provider.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Interval, Period } from '@marketlens/contracts';
import type { GetSeriesParams, MarketDataProvider, PriceBar } from '@marketlens/contracts';
import { CachedSeriesProvider, seriesCacheKey } from '../src/cached-provider.js';

const params: GetSeriesParams = { symbol: 'AAPL', period: Period.MO6, interval: Interval.D1 };

const bar: PriceBar = {
  timestamp: '2025-01-02T00:00:00.000Z',
  open: 100,
  high: 101,
  low: 99,
  close: 100.5,
  volume: 1000,
};

function fakeProvider(getSeries: MarketDataProvider['getSeries']): MarketDataProvider {
  return { id: 'fake', getSeries };
}

describe('seriesCacheKey', () => {
  it('should join symbol, period and interval', () => {
    expect(seriesCacheKey(params)).toBe('AAPL_6mo_1d');
  });
});

describe('CachedSeriesProvider', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
  });

  it('should derive its id from the upstream provider', () => {
    const provider = new CachedSeriesProvider(fakeProvider(async () => []));

    expect(provider.id).toBe('cached:fake');
  });

  it('should serve repeated requests from the cache within the ttl', async () => {
    const getSeries = vi.fn<MarketDataProvider['getSeries']>().mockResolvedValue([bar]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { ttlMs: 1_000, now });

    await provider.getSeries(params);
    clock = 999;
    const second = await provider.getSeries(params);

    expect(second).toEqual([bar]);
    expect(getSeries).toHaveBeenCalledTimes(1);
  });

  it('should refetch after the ttl has elapsed', async () => {
    const getSeries = vi.fn<MarketDataProvider['getSeries']>().mockResolvedValue([bar]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { ttlMs: 1_000, now });

    await provider.getSeries(params);
    clock = 1_000;
    await provider.getSeries(params);

    expect(getSeries).toHaveBeenCalledTimes(2);
  });

  it('should keep different intervals apart', async () => {
    const getSeries = vi.fn<MarketDataProvider['getSeries']>().mockResolvedValue([bar]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { now });

    await provider.getSeries(params);
    await provider.getSeries({ ...params, interval: Interval.WK1 });

    expect(getSeries).toHaveBeenCalledTimes(2);
  });

  it('should not cache an empty series', async () => {
    const getSeries = vi.fn<MarketDataProvider['getSeries']>().mockResolvedValue([]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { now });

    await provider.getSeries(params);
    await provider.getSeries(params);

    expect(getSeries).toHaveBeenCalledTimes(2);
  });

  it('should share one upstream request between concurrent misses', async () => {
    let resolve: (bars: PriceBar[]) => void = () => {};
    const getSeries = vi.fn<MarketDataProvider['getSeries']>(
      () =>
        new Promise<PriceBar[]>((r) => {
          resolve = r;
        })
    );
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { now });

    const first = provider.getSeries(params);
    const second = provider.getSeries(params);
    expect(provider.getStats().inflight).toBe(1);

    resolve([bar]);

    await expect(Promise.all([first, second])).resolves.toEqual([[bar], [bar]]);
    expect(getSeries).toHaveBeenCalledTimes(1);
    expect(provider.getStats().inflight).toBe(0);
  });

  it('should propagate failures without caching them', async () => {
    const getSeries = vi
      .fn<MarketDataProvider['getSeries']>()
      .mockRejectedValueOnce(new Error('upstream down'))
      .mockResolvedValueOnce([bar]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { now });

    await expect(provider.getSeries(params)).rejects.toThrow('upstream down');
    await expect(provider.getSeries(params)).resolves.toEqual([bar]);
    expect(getSeries).toHaveBeenCalledTimes(2);
  });

  it('should drop a single entry on invalidate', async () => {
    const getSeries = vi.fn<MarketDataProvider['getSeries']>().mockResolvedValue([bar]);
    const provider = new CachedSeriesProvider(fakeProvider(getSeries), { now });

    await provider.getSeries(params);
    expect(provider.invalidate(params)).toBe(true);
    await provider.getSeries(params);

    expect(getSeries).toHaveBeenCalledTimes(2);
  });
});
