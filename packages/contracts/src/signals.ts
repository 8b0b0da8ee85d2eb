/**
 * @fileoverview Trading signal types and the strategy capability contract.
 *
 * @module @marketlens/contracts/signals
 */

import type { EnrichedSeries } from './indicators.js';

/**
 * Output of a single strategy evaluation.
 *
 * @invariant buy and sell are never both true
 * @invariant strength is 0 when neither buy nor sell fires
 */
export interface Signal {
  readonly buy: boolean;
  readonly sell: boolean;
  /** Confidence of the fired direction, normally within [0, 1] */
  readonly strength: number;
}

export type SignalAction = 'buy' | 'sell' | 'hold';

/**
 * Signals of several strategies keyed by {@link TradingStrategy.name}.
 */
export type SignalMap = Record<string, Signal>;

/**
 * A rule-based signal generator.
 *
 * Implementations are pure: the same enriched series always yields the same
 * signal, and nothing is retained between calls.
 */
export interface TradingStrategy {
  /** Stable identifier, used as the key in a {@link SignalMap} */
  readonly name: string;

  generateSignals(series: EnrichedSeries): Signal;
}

export type FractalKind = 'bullish' | 'bearish';

/**
 * Local extremum confirmed by two bars on each side.
 */
export interface FractalPoint {
  /** Index of the extremum bar within the series */
  index: number;
  kind: FractalKind;
}

/**
 * A historically significant high and how strongly it is expected to cap price.
 */
export interface ResistanceLevel {
  price: number;
  /** 0-1, grows with the number of touches and proximity to current price */
  strength: number;
}

/**
 * Combined view over the signals of several strategies.
 *
 * @invariant 0 <= buyScore, sellScore, confidence <= 1
 * @invariant buyCount + sellCount + holdCount === total
 */
export interface Consensus {
  action: SignalAction;
  confidence: number;
  buyScore: number;
  sellScore: number;
  buyCount: number;
  sellCount: number;
  holdCount: number;
  total: number;
}

/**
 * The signal every strategy returns when it has nothing to say.
 */
export const NEUTRAL_SIGNAL: Signal = Object.freeze({ buy: false, sell: false, strength: 0 });

/**
 * Maps a signal to the action a dashboard would display.
 *
 * @example
 * ```typescript
 * signalToAction({ buy: true, sell: false, strength: 0.7 })  // 'buy'
 * signalToAction(NEUTRAL_SIGNAL)                            // 'hold'
 * ```
 */
export function signalToAction(signal: Signal): SignalAction {
  if (signal.buy) return 'buy';
  if (signal.sell) return 'sell';
  return 'hold';
}
