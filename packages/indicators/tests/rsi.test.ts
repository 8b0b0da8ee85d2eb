import { describe, it, expect } from 'vitest';
import { calculateRsi } from '../src/rsi.js';
import { wavyCloses } from './helpers.js';

describe('calculateRsi', () => {
  it('should first be defined at index period - 1', () => {
    const rsi = calculateRsi(wavyCloses(30), 14);

    expect(rsi.slice(0, 13).every((value) => value === undefined)).toBe(true);
    expect(rsi[13]).toBeDefined();
  });

  it('should be 100 when the window has no losses', () => {
    expect(calculateRsi([1, 2, 3, 4], 3)).toEqual([undefined, undefined, 100, 100]);
  });

  it('should be 0 when the window has no gains', () => {
    expect(calculateRsi([4, 3, 2, 1], 3)).toEqual([undefined, undefined, 0, 0]);
  });

  it('should balance to 50 when gains equal losses', () => {
    // deltas: 0, +1, -1
    expect(calculateRsi([10, 11, 10], 3)[2]).toBe(50);
  });

  it('should stay within [0, 100]', () => {
    const rsi = calculateRsi(wavyCloses(120), 14);

    for (const value of rsi) {
      if (value === undefined) continue;
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });
});
