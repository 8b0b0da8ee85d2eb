import type { PriceBar } from '@marketlens/contracts';

const DAY_MS = 86_400_000;
const START = Date.UTC(2025, 0, 2);

export function timestampAt(index: number): string {
  return new Date(START + index * DAY_MS).toISOString();
}

/**
 * Bars whose open equals close and whose high/low sit 1% either side.
 */
export function barsFromCloses(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: timestampAt(i),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: 1_000_000,
  }));
}

/**
 * Deterministic zig-zag around a drifting base.
 */
export function wavyCloses(count: number, base = 100): number[] {
  return Array.from({ length: count }, (_, i) => base + i * 0.3 + 5 * Math.sin(i / 3));
}
