import { describe, it, expect } from 'vitest';
import { ema, sma, rollingStd } from '../src/moving-averages.js';

describe('ema', () => {
  it('should seed from the first value and smooth recursively', () => {
    expect(ema([1, 2, 3], 3)).toEqual([1, 1.5, 2.25]);
  });

  it('should be defined at every index', () => {
    const result = ema([5, 6, 7, 8, 9], 12);

    expect(result).toHaveLength(5);
    expect(result.every((value) => Number.isFinite(value))).toBe(true);
  });

  it('should return an empty array for empty input', () => {
    expect(ema([], 9)).toEqual([]);
  });
});

describe('sma', () => {
  it('should leave the warm-up positions undefined', () => {
    expect(sma([1, 2, 3, 4, 5], 3)).toEqual([undefined, undefined, 2, 3, 4]);
  });

  it('should be entirely undefined when the window exceeds the data', () => {
    expect(sma([1, 2], 3)).toEqual([undefined, undefined]);
  });
});

describe('rollingStd', () => {
  it('should use the sample (n - 1) denominator', () => {
    const [, , , last] = rollingStd([1, 2, 3, 4], 4);

    expect(last).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it('should be zero for a constant window', () => {
    expect(rollingStd([7, 7, 7], 2)).toEqual([undefined, 0, 0]);
  });
});
