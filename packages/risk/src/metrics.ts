import {
  IMPACT_CAP,
  RELATIVE_SIZE_CAP,
  SPIKE_SCORE_CAP,
  absBigInt,
  minBigInt,
  type ImpactSettings,
  type PoolMetrics,
} from '@tickguard/shared';

import type { MetricSnapshot, WhyRule } from './types';

/**
 * Trade size as a multiple of the pool's average, floored and capped at 10.
 * A pool with no average yet reads as neutral (1).
 */
export function relativeSize(tradeSize: bigint, averageTradeSize: bigint): bigint {
  if (averageTradeSize === 0n) return 1n;
  return minBigInt(absBigInt(tradeSize) / averageTradeSize, RELATIVE_SIZE_CAP);
}

/**
 * Distance between the current and last observed metric. Ticks are used as is;
 * prices are divided down to a 0..10 scale.
 */
export function impact(
  currentMetric: bigint | null,
  lastMetric: bigint | null,
  settings: Pick<ImpactSettings, 'impactUnit' | 'priceImpactDivisor'>,
): bigint {
  if (currentMetric === null || lastMetric === null) return 0n;
  const delta = absBigInt(currentMetric - lastMetric);
  if (settings.impactUnit === 'tick') return delta;
  return minBigInt(delta / settings.priceImpactDivisor, IMPACT_CAP);
}

/** The stored counter is left alone; only the scoring input is capped. */
export function spikeCount(metrics: Pick<PoolMetrics, 'consecutiveSpikeCount'>): bigint {
  return minBigInt(BigInt(metrics.consecutiveSpikeCount), SPIKE_SCORE_CAP);
}

export function deriveMetrics(
  metrics: PoolMetrics,
  tradeSize: bigint,
  currentMetric: bigint | null,
  settings: Pick<ImpactSettings, 'impactUnit' | 'priceImpactDivisor'>,
): MetricSnapshot {
  const why: WhyRule[] = [];

  const size = relativeSize(tradeSize, metrics.averageTradeSize);
  if (metrics.averageTradeSize === 0n) why.push('cold_start_size');
  else if (size === RELATIVE_SIZE_CAP) why.push('size_capped');

  const delta = impact(currentMetric, metrics.lastObservedMetric, settings);
  if (metrics.lastObservedMetric === null || currentMetric === null) why.push('cold_start_impact');
  else if (settings.impactUnit === 'price' && delta === IMPACT_CAP) why.push('impact_capped');

  const spikes = spikeCount(metrics);
  if (spikes > 0n) why.push('spike_history');
  if (BigInt(metrics.consecutiveSpikeCount) > SPIKE_SCORE_CAP) why.push('spike_capped');

  return { relativeSize: size, impact: delta, spikeCount: spikes, why };
}
