import { describe, it, expect } from 'vitest';
import {
  FibonacciStrategy,
  FIBONACCI_RATIOS,
  calculateFibonacciLevels,
} from '../src/fibonacci-strategy.js';
import { makeBar, flatBars } from './helpers.js';
import type { PriceBar } from '@marketlens/contracts';

/**
 * 30 bars closing at `base` with a `high` at bar 5, a `low` at bar 6 and the
 * given final close.
 */
function rangeBars(lastClose: number, high = 110, low = 90, base = 100): PriceBar[] {
  return Array.from({ length: 30 }, (_, i) => {
    if (i === 5) return makeBar(i, { close: base, high });
    if (i === 6) return makeBar(i, { close: base, low });
    if (i === 29) return makeBar(i, { close: lastClose });
    return makeBar(i, { close: base });
  });
}

describe('calculateFibonacciLevels', () => {
  it('should measure retracements down from the high', () => {
    const levels = calculateFibonacciLevels(100, 0);

    expect(levels.map((level) => level.ratio)).toEqual([...FIBONACCI_RATIOS]);
    expect(levels[0]?.price).toBe(100);
    expect(levels.find((level) => level.ratio === 0.618)?.price).toBeCloseTo(38.2, 10);
    expect(levels[levels.length - 1]?.price).toBe(0);
  });
});

describe('FibonacciStrategy', () => {
  const strategy = new FibonacciStrategy();

  it('should be named Fibonacci', () => {
    expect(strategy.name).toBe('Fibonacci');
  });

  it('should buy near the 38.2% level', () => {
    // 38.2% level of 110/90 is 102.36
    const signal = strategy.generateSignals({ bars: rangeBars(102) });

    expect(signal.buy).toBe(true);
    expect(signal.sell).toBe(false);
    expect(signal.strength).toBeCloseTo(1 - 0.36 / 102, 10);
  });

  it('should buy near the 23.6% level', () => {
    // 23.6% level of 110/90 is 105.28
    const signal = strategy.generateSignals({ bars: rangeBars(105) });

    expect(signal.buy).toBe(true);
    expect(signal.strength).toBeCloseTo(1 - 0.28 / 105, 10);
  });

  it('should buy near the 61.8% level', () => {
    // 61.8% level of 110/90 is 97.64
    const signal = strategy.generateSignals({ bars: rangeBars(98) });

    expect(signal.buy).toBe(true);
    expect(signal.strength).toBeCloseTo(1 - 0.36 / 98, 10);
  });

  it('should take the first matching level in 23.6, 38.2, 61.8 order', () => {
    // 110/100 range: 23.6% is 107.64, 38.2% is 106.18; 106.5 is within 2% of
    // both and nearer the 38.2% level
    const signal = strategy.generateSignals({ bars: rangeBars(106.5, 110, 100, 105) });

    expect(signal.buy).toBe(true);
    expect(signal.strength).toBeCloseTo(1 - 1.14 / 106.5, 10);
  });

  it.each([
    ['0%', 108.5],
    ['78.6%', 94.5],
    ['100%', 91],
  ])('should stay neutral near the %s level', (_label, close) => {
    expect(strategy.generateSignals({ bars: rangeBars(close) })).toEqual({
      buy: false,
      sell: false,
      strength: 0,
    });
  });

  it('should stay neutral at the 50% level', () => {
    expect(strategy.generateSignals({ bars: rangeBars(100) })).toEqual({
      buy: false,
      sell: false,
      strength: 0,
    });
  });

  it('should stay neutral below 30 bars', () => {
    expect(strategy.generateSignals({ bars: flatBars(29) })).toEqual({
      buy: false,
      sell: false,
      strength: 0,
    });
  });
});
