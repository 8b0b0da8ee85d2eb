import { describe, it, expect, beforeEach } from 'vitest';
import { TtlCache } from '../src/ttl-cache.js';

describe('TtlCache', () => {
  let clock: number;
  const now = () => clock;

  beforeEach(() => {
    clock = 1_000;
  });

  it('should return a value while it is fresh', () => {
    const cache = new TtlCache<string>({ ttlMs: 100, now });
    cache.set('a', 'alpha');

    clock += 99;

    expect(cache.get('a')).toBe('alpha');
    expect(cache.has('a')).toBe(true);
  });

  it('should expire a value once the ttl has elapsed', () => {
    const cache = new TtlCache<string>({ ttlMs: 100, now });
    cache.set('a', 'alpha');

    clock += 100;

    expect(cache.get('a')).toBeUndefined();
    expect(cache.getStats()).toMatchObject({ misses: 1, expirations: 1, size: 0 });
  });

  it('should restart the ttl when a key is overwritten', () => {
    const cache = new TtlCache<string>({ ttlMs: 100, now });
    cache.set('a', 'alpha');
    clock += 60;
    cache.set('a', 'beta');
    clock += 60;

    expect(cache.get('a')).toBe('beta');
  });

  it('should evict the oldest insertion when full', () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000, maxEntries: 2, now });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('c', 3);

    expect(cache.has('a')).toBe(false);
    expect(cache.get('b')).toBe(2);
    expect(cache.get('c')).toBe(3);
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should treat a re-set key as the newest insertion', () => {
    const cache = new TtlCache<number>({ ttlMs: 1_000, maxEntries: 2, now });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.has('b')).toBe(false);
    expect(cache.get('a')).toBe(10);
  });

  it('should count hits and misses', () => {
    const cache = new TtlCache<number>({ now });
    cache.set('a', 1);
    cache.get('a');
    cache.get('a');
    cache.get('missing');

    expect(cache.getStats()).toEqual({
      hits: 2,
      misses: 1,
      sets: 1,
      evictions: 0,
      expirations: 0,
      size: 1,
    });
  });

  it('should delete and clear entries', () => {
    const cache = new TtlCache<number>({ now });
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.clear();
    expect(cache.getStats().size).toBe(0);
  });

  it('should reject a non-positive ttl', () => {
    expect(() => new TtlCache({ ttlMs: 0 })).toThrow('ttlMs must be a positive number, got 0');
  });
});
