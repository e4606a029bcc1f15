import { SPIKE_COUNTER_MAX, absBigInt, type ImpactSettings, type PoolMetrics, type Trade } from '@tickguard/shared';

import { relativeSize } from './metrics';

/** EMA weights: 90% history, 10% latest trade. */
const EMA_HISTORY_WEIGHT = 9n;
const EMA_DENOMINATOR = 10n;

export function nextAverageTradeSize(averageTradeSize: bigint, tradeSize: bigint): bigint {
  if (averageTradeSize === 0n) return tradeSize;
  return (averageTradeSize * EMA_HISTORY_WEIGHT + tradeSize) / EMA_DENOMINATOR;
}

/**
 * A spike is judged against the pre-update average: the one `evaluate` scored
 * this trade with, before `applyTrade` folds the trade into the EMA. Equal to
 * the threshold is not a spike.
 */
export function nextSpikeCount(
  metrics: Pick<PoolMetrics, 'averageTradeSize' | 'consecutiveSpikeCount'>,
  tradeSize: bigint,
  spikeThreshold: number,
): number {
  if (relativeSize(tradeSize, metrics.averageTradeSize) > BigInt(spikeThreshold)) {
    return Math.min(metrics.consecutiveSpikeCount + 1, SPIKE_COUNTER_MAX);
  }
  return 0;
}

/**
 * Folds one settled trade into the pool history. Degenerate trades (zero size,
 * or no post-trade metric) return the input object untouched.
 */
export function applyTrade(
  metrics: PoolMetrics,
  trade: Trade,
  settings: Pick<ImpactSettings, 'spikeThreshold'>,
): PoolMetrics {
  if (trade.resultingMetric === null) return metrics;
  const size = absBigInt(trade.size);
  if (size === 0n) return metrics;

  return {
    lastObservedMetric: trade.resultingMetric,
    lastTradeSize: size,
    averageTradeSize: nextAverageTradeSize(metrics.averageTradeSize, size),
    consecutiveSpikeCount: nextSpikeCount(metrics, size, settings.spikeThreshold),
  };
}
