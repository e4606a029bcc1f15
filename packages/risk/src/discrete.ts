import { RISK_SCORE_MAX, clampBigInt, type DiscretePoolConfig, type PoolMetrics } from '@tickguard/shared';

import { deriveMetrics } from './metrics';
import type { FeeAssessment, FeeTier, MetricSnapshot, RiskFeeStrategy, WhyRule } from './types';

export function riskScore(
  config: Pick<DiscretePoolConfig, 'w1' | 'w2' | 'w3'>,
  metrics: Pick<MetricSnapshot, 'relativeSize' | 'impact' | 'spikeCount'>,
): number {
  const raw =
    BigInt(config.w1) * metrics.relativeSize +
    BigInt(config.w2) * metrics.impact +
    BigInt(config.w3) * metrics.spikeCount;
  return Number(clampBigInt(raw, 0n, BigInt(RISK_SCORE_MAX)));
}

// Tiers are half-open: a score equal to a threshold belongs to the tier above it.
export function tierForScore(config: Pick<DiscretePoolConfig, 'thresholdLow' | 'thresholdHigh'>, score: number): FeeTier {
  if (score < config.thresholdLow) return 'low';
  if (score < config.thresholdHigh) return 'medium';
  return 'high';
}

export function feeForTier(config: Pick<DiscretePoolConfig, 'feeLow' | 'feeMed' | 'feeHigh'>, tier: FeeTier): number {
  switch (tier) {
    case 'low':
      return config.feeLow;
    case 'medium':
      return config.feeMed;
    case 'high':
      return config.feeHigh;
  }
}

const TIER_RULE: Record<FeeTier, WhyRule> = {
  low: 'tier_low',
  medium: 'tier_medium',
  high: 'tier_high',
};

function assess(
  config: DiscretePoolConfig,
  metrics: PoolMetrics,
  tradeSize: bigint,
  currentMetric: bigint | null,
): FeeAssessment {
  const snapshot = deriveMetrics(metrics, tradeSize, currentMetric, config);
  const why: WhyRule[] = [...snapshot.why];

  const score = riskScore(config, snapshot);
  if (score === RISK_SCORE_MAX) why.push('score_saturated');

  const tier = tierForScore(config, score);
  why.push(TIER_RULE[tier]);

  return {
    model: 'discrete',
    feeBps: feeForTier(config, tier),
    metrics: snapshot,
    score,
    tier,
    why,
  };
}

export const discreteStrategy: RiskFeeStrategy<DiscretePoolConfig> = {
  model: 'discrete',
  assess,
  computeFee(config, metrics, tradeSize, currentMetric) {
    return assess(config, metrics, tradeSize, currentMetric).feeBps;
  },
};
