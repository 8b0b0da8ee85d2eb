import { describe, it, expect } from 'vitest';
import { BollingerStrategy } from '../src/bollinger-strategy.js';
import { flatBars, withIndicators } from './helpers.js';

function bandsAtLast(count: number, upper: number, lower: number) {
  const upperBand = Array.from({ length: count }, (_, i) => (i === count - 1 ? upper : undefined));
  const lowerBand = Array.from({ length: count }, (_, i) => (i === count - 1 ? lower : undefined));
  return { upperBand, lowerBand };
}

describe('BollingerStrategy', () => {
  const strategy = new BollingerStrategy();
  const bars = flatBars(20, 100);

  it('should be named Bollinger Bands', () => {
    expect(strategy.name).toBe('Bollinger Bands');
  });

  it('should buy near the lower band', () => {
    const series = withIndicators(bars, bandsAtLast(20, 110, 99));

    const signal = strategy.generateSignals(series);

    expect(signal.buy).toBe(true);
    expect(signal.sell).toBe(false);
    expect(signal.strength).toBeCloseTo(1 - 1 / 99, 12);
  });

  it('should cap strength at 1 below the lower band', () => {
    const series = withIndicators(bars, bandsAtLast(20, 110, 101));

    expect(strategy.generateSignals(series)).toEqual({ buy: true, sell: false, strength: 1 });
  });

  it('should sell near the upper band', () => {
    const series = withIndicators(bars, bandsAtLast(20, 101, 90));

    const signal = strategy.generateSignals(series);

    expect(signal.sell).toBe(true);
    expect(signal.buy).toBe(false);
    expect(signal.strength).toBeCloseTo(0.99, 12);
  });

  it('should stay neutral between the bands', () => {
    const series = withIndicators(bars, bandsAtLast(20, 110, 90));

    expect(strategy.generateSignals(series)).toEqual({ buy: false, sell: false, strength: 0 });
  });

  it('should stay neutral below 20 bars', () => {
    const short = flatBars(19, 100);
    const series = withIndicators(short, bandsAtLast(19, 101, 99.5));

    expect(strategy.generateSignals(series)).toEqual({ buy: false, sell: false, strength: 0 });
  });

  it('should stay neutral while the bands are undefined', () => {
    expect(strategy.generateSignals(withIndicators(bars, {}))).toEqual({
      buy: false,
      sell: false,
      strength: 0,
    });
  });
});
