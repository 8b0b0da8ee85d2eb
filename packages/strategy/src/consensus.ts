/**
 * Weighted consensus over a map of strategy signals.
 *
 * @module @marketlens/strategy/consensus
 */

import { MarketLensError } from '@marketlens/contracts';
import type { Consensus, SignalMap } from '@marketlens/contracts';
import { clampStrength } from './base.js';

/** Per-strategy weights; strategies not listed weigh 1 */
export type StrategyWeights = Readonly<Record<string, number>>;

/**
 * Folds strategy signals into a single action.
 *
 * Each buy adds `weight * strength` to the buy score, each sell to the sell
 * score; both scores are divided by the total weight. The larger score wins
 * and the confidence is the gap between them. Ties and empty maps hold.
 *
 * @example
 * ```typescript
 * buildConsensus({
 *   MACD: { buy: true, sell: false, strength: 0.6 },
 *   Fibonacci: { buy: false, sell: false, strength: 0 }
 * });
 * // { action: 'buy', confidence: 0.3, buyScore: 0.3, sellScore: 0, ... }
 * ```
 */
export function buildConsensus(signals: SignalMap, weights: StrategyWeights = {}): Consensus {
  let buyWeighted = 0;
  let sellWeighted = 0;
  let totalWeight = 0;
  let buyCount = 0;
  let sellCount = 0;
  let holdCount = 0;

  for (const [name, signal] of Object.entries(signals)) {
    const weight = weights[name] ?? 1;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new MarketLensError('INVALID_WEIGHT', `Weight for "${name}" must be >= 0, got ${weight}`, {
        name,
        weight,
      });
    }

    totalWeight += weight;
    const strength = clampStrength(signal.strength);

    if (signal.buy) {
      buyCount++;
      buyWeighted += weight * strength;
    } else if (signal.sell) {
      sellCount++;
      sellWeighted += weight * strength;
    } else {
      holdCount++;
    }
  }

  const buyScore = totalWeight > 0 ? buyWeighted / totalWeight : 0;
  const sellScore = totalWeight > 0 ? sellWeighted / totalWeight : 0;

  let action: Consensus['action'] = 'hold';
  if (buyScore > sellScore) action = 'buy';
  else if (sellScore > buyScore) action = 'sell';

  return {
    action,
    confidence: Math.abs(buyScore - sellScore),
    buyScore,
    sellScore,
    buyCount,
    sellCount,
    holdCount,
    total: buyCount + sellCount + holdCount,
  };
}
