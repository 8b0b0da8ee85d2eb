import { SymbolResolutionError } from '@marketlens/contracts';
import type { GetSeriesParams, MarketDataProvider, PriceBar } from '@marketlens/contracts';

const DAY_MS = 86_400_000;
const START = Date.UTC(2025, 0, 2);

export function barsFromCloses(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(START + i * DAY_MS).toISOString(),
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: 1_000_000,
  }));
}

export function wavyCloses(count: number, base = 100): number[] {
  return Array.from({ length: count }, (_, i) => base + i * 0.3 + 5 * Math.sin(i / 3));
}

export type FakeEntry = PriceBar[] | Error;

/**
 * In-memory provider keyed by symbol. Unknown symbols fail the way the
 * Yahoo provider does for a 404.
 */
export class FakeProvider implements MarketDataProvider {
  readonly id = 'fake';
  readonly calls: GetSeriesParams[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly entries: Record<string, FakeEntry>,
    private readonly delayMs = 0
  ) {}

  async getSeries(params: GetSeriesParams): Promise<PriceBar[]> {
    this.calls.push(params);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const entry = this.entries[params.symbol];
      if (entry === undefined) {
        throw new SymbolResolutionError(`Symbol "${params.symbol}" not found`, {
          symbol: params.symbol,
          provider: this.id,
        });
      }
      if (entry instanceof Error) throw entry;
      return entry.map((bar) => ({ ...bar }));
    } finally {
      this.active--;
    }
  }
}
