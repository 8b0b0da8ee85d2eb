import { describe, it, expect } from 'vitest';
import {
  FractalStrategy,
  calculateFractalDimension,
  identifyFractals,
} from '../src/fractal-strategy.js';
import { makeBar } from './helpers.js';
import type { PriceBar } from '@marketlens/contracts';

function barsFromLows(lows: readonly number[]): PriceBar[] {
  return lows.map((low, i) => makeBar(i, { close: 11, high: 12, low }));
}

function barsFromHighs(highs: readonly number[]): PriceBar[] {
  return highs.map((high, i) => makeBar(i, { close: 11, high, low: 10 }));
}

describe('identifyFractals', () => {
  it('should flag a strict low as bullish', () => {
    expect(identifyFractals(barsFromLows([10, 10, 5, 10, 10]))).toEqual([
      { index: 2, kind: 'bullish' },
    ]);
  });

  it('should flag a strict high as bearish', () => {
    expect(identifyFractals(barsFromHighs([12, 13, 15, 13, 12]))).toEqual([
      { index: 2, kind: 'bearish' },
    ]);
  });

  it('should ignore ties with a neighbour', () => {
    expect(identifyFractals(barsFromLows([10, 5, 5, 10, 10]))).toEqual([]);
  });

  it('should mark a bar that is both', () => {
    const bars = [
      makeBar(0, { close: 11, high: 12, low: 10 }),
      makeBar(1, { close: 11, high: 12, low: 10 }),
      makeBar(2, { close: 11, high: 20, low: 5 }),
      makeBar(3, { close: 11, high: 12, low: 10 }),
      makeBar(4, { close: 11, high: 12, low: 10 }),
    ];

    expect(identifyFractals(bars)).toEqual([
      { index: 2, kind: 'bullish' },
      { index: 2, kind: 'bearish' },
    ]);
  });

  it('should never flag the first two or last two bars', () => {
    const fractals = identifyFractals(barsFromLows([1, 10, 10, 10, 10, 10, 1]));

    expect(fractals).toEqual([]);
  });
});

describe('calculateFractalDimension', () => {
  it('should return 1 for fewer than five values', () => {
    expect(calculateFractalDimension([1, 2, 3, 4])).toBe(1);
  });

  it('should return 1 for a flat series', () => {
    expect(calculateFractalDimension([5, 5, 5, 5, 5, 5])).toBe(1);
  });

  it('should return 1 for non-finite input', () => {
    expect(calculateFractalDimension([1, 2, Number.NaN, 4, 5])).toBe(1);
  });

  it('should be a positive dimension below 1 for a straight line', () => {
    const line = Array.from({ length: 100 }, (_, i) => 50 + i);

    const dimension = calculateFractalDimension(line);

    expect(dimension).toBeGreaterThan(0.3);
    expect(dimension).toBeLessThan(1);
  });
});

describe('FractalStrategy', () => {
  const strategy = new FractalStrategy();

  it('should be named Fractal', () => {
    expect(strategy.name).toBe('Fractal');
  });

  it('should buy on a recent bullish fractal with half the dimension as strength', () => {
    // flat closes give dimension 1
    const signal = strategy.generateSignals({ bars: barsFromLows([10, 10, 5, 10, 10]) });

    expect(signal).toEqual({ buy: true, sell: false, strength: 0.5 });
  });

  it('should sell on a recent bearish fractal', () => {
    const signal = strategy.generateSignals({ bars: barsFromHighs([12, 13, 15, 13, 12]) });

    expect(signal).toEqual({ buy: false, sell: true, strength: 0.5 });
  });

  it('should ignore fractals older than the last three bars', () => {
    const signal = strategy.generateSignals({
      bars: barsFromLows([10, 10, 5, 10, 10, 10, 10, 10]),
    });

    expect(signal).toEqual({ buy: false, sell: false, strength: 0 });
  });

  it('should stay neutral below five bars', () => {
    expect(strategy.generateSignals({ bars: barsFromLows([10, 5, 10, 10]) })).toEqual({
      buy: false,
      sell: false,
      strength: 0,
    });
  });
});
