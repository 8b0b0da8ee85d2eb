/**
 * Single-symbol analysis and multi-symbol screening.
 *
 * One analysis is: fetch bars, compute indicators, run every strategy, then
 * fold the signals into a consensus and a snapshot of the latest bar.
 */

import { isMarketLensError, MarketLensError } from '@marketlens/contracts';
import type {
  Consensus,
  Interval,
  MarketDataProvider,
  Period,
  ResistanceLevel,
  SignalMap,
  TradingStrategy,
} from '@marketlens/contracts';
import { computeIndicators } from '@marketlens/indicators';
import type { FailureMode } from '@marketlens/indicators';
import { createChildLogger, measureAsync, measureSync, startTimer } from '@marketlens/logger';
import type { Logger } from '@marketlens/logger';
import {
  buildConsensus,
  generateAllSignals,
  rankResistanceLevels,
  summarizeMarket,
} from '@marketlens/strategy';
import type { MarketSummary, StrategyWeights } from '@marketlens/strategy';

/** Nearest resistance levels above the close kept in a report */
const MAX_RESISTANCE_LEVELS = 3;

export interface AnalysisServiceOptions {
  provider: MarketDataProvider;
  strategies: readonly TradingStrategy[];
  logger: Logger;
  /** @default 'degrade' */
  failureMode?: FailureMode;
  weights?: StrategyWeights;
  /** @default 4 */
  screenConcurrency?: number;
}

export interface AnalyzeOptions {
  period: Period;
  interval: Interval;
}

export interface ScreenOptions extends AnalyzeOptions {
  /** Overrides the service-wide screen concurrency */
  concurrency?: number;
}

export interface AnalysisReport {
  symbol: string;
  period: Period;
  interval: Interval;
  barCount: number;
  /** Timestamp of the latest bar */
  asOf: string;
  /** False when indicator computation degraded to the raw series */
  indicatorsAvailable: boolean;
  signals: SignalMap;
  consensus: Consensus;
  context: MarketSummary;
  /** Up to three levels above the close, nearest first */
  resistanceLevels: ResistanceLevel[];
}

export type ScreenResult =
  | { symbol: string; status: 'ok'; report: AnalysisReport }
  | { symbol: string; status: 'error'; error: { code: string; message: string } };

function describeFailure(reason: unknown): { code: string; message: string } {
  if (isMarketLensError(reason)) {
    return { code: reason.code, message: reason.message };
  }
  return {
    code: 'ANALYSIS_FAILED',
    message: reason instanceof Error ? reason.message : String(reason),
  };
}

export class AnalysisService {
  private readonly provider: MarketDataProvider;
  private readonly strategies: readonly TradingStrategy[];
  private readonly logger: Logger;
  private readonly failureMode: FailureMode;
  private readonly weights: StrategyWeights;
  private readonly screenConcurrency: number;

  constructor(options: AnalysisServiceOptions) {
    const { screenConcurrency = 4 } = options;
    if (!Number.isInteger(screenConcurrency) || screenConcurrency < 1) {
      throw new MarketLensError(
        'INVALID_CONCURRENCY',
        `screenConcurrency must be a positive integer, got ${screenConcurrency}`
      );
    }

    this.provider = options.provider;
    this.strategies = options.strategies;
    this.logger = createChildLogger(options.logger, { component: 'analysis' });
    this.failureMode = options.failureMode ?? 'degrade';
    this.weights = options.weights ?? {};
    this.screenConcurrency = screenConcurrency;
  }

  /**
   * @throws {MarketLensError} NO_DATA when the provider returns no bars, and
   * whatever the provider or a `throw`-mode indicator failure raises
   */
  async analyzeSymbol(symbol: string, options: AnalyzeOptions): Promise<AnalysisReport> {
    const timer = startTimer();
    const normalized = symbol.trim().toUpperCase();
    const { period, interval } = options;

    const { result: bars, duration_ms: fetchMs } = await measureAsync(() =>
      this.provider.getSeries({ symbol: normalized, period, interval })
    );
    const { result: enriched, duration_ms: computeMs } = measureSync(() =>
      computeIndicators(bars, { failureMode: this.failureMode, logger: this.logger })
    );
    this.logger.debug('Series prepared', {
      symbol: normalized,
      count: bars.length,
      fetch_ms: fetchMs,
      compute_ms: computeMs,
    });

    const context = summarizeMarket(enriched);
    if (!context) {
      throw new MarketLensError('NO_DATA', `No price data returned for ${normalized}`, {
        symbol: normalized,
        period,
        interval,
      });
    }

    const signals = generateAllSignals(enriched, this.strategies, this.logger);
    const consensus = buildConsensus(signals, this.weights);
    const resistanceLevels = rankResistanceLevels(bars, context.close)
      .filter((level) => level.price > context.close)
      .sort((a, b) => a.price - b.price)
      .slice(0, MAX_RESISTANCE_LEVELS);

    const report: AnalysisReport = {
      symbol: normalized,
      period,
      interval,
      barCount: bars.length,
      asOf: context.timestamp,
      indicatorsAvailable: enriched.indicators !== undefined,
      signals,
      consensus,
      context,
      resistanceLevels,
    };

    this.logger.info('Analysis complete', {
      symbol: normalized,
      period,
      interval,
      count: bars.length,
      action: consensus.action,
      confidence: consensus.confidence,
      duration_ms: timer.stop(),
    });

    return report;
  }

  /**
   * Analyzes many symbols, `concurrency` at a time. Symbols are upper-cased
   * and de-duplicated; results keep input order and a failure for one symbol
   * is reported in its result instead of rejecting the whole run.
   */
  async screenSymbols(symbols: readonly string[], options: ScreenOptions): Promise<ScreenResult[]> {
    const concurrency = options.concurrency ?? this.screenConcurrency;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new MarketLensError(
        'INVALID_CONCURRENCY',
        `concurrency must be a positive integer, got ${concurrency}`
      );
    }

    const unique = [...new Set(symbols.map((s) => s.trim().toUpperCase()).filter((s) => s !== ''))];
    const timer = startTimer();
    const results: ScreenResult[] = [];

    for (let start = 0; start < unique.length; start += concurrency) {
      const batch = unique.slice(start, start + concurrency);
      const settled = await Promise.allSettled(
        batch.map((symbol) => this.analyzeSymbol(symbol, options))
      );

      settled.forEach((outcome, i) => {
        const symbol = batch[i] ?? '';
        if (outcome.status === 'fulfilled') {
          results.push({ symbol, status: 'ok', report: outcome.value });
        } else {
          const error = describeFailure(outcome.reason);
          this.logger.warn('Symbol analysis failed', {
            symbol,
            error_code: error.code,
            error: error.message,
          });
          results.push({ symbol, status: 'error', error });
        }
      });
    }

    this.logger.info('Screen complete', {
      count: unique.length,
      failed: results.filter((r) => r.status === 'error').length,
      concurrency,
      duration_ms: timer.stop(),
    });

    return results;
  }
}
