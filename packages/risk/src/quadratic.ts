import { clampBigInt, mulFixed, type PoolMetrics, type QuadraticPoolConfig } from '@tickguard/shared';

import { deriveMetrics } from './metrics';
import type { FeeAssessment, RiskFeeStrategy, WhyRule } from './types';

/**
 * baseFee + k1*delta + k2*delta^2, clamped to [baseFee, maxFee].
 *
 * k1 and k2 are in tenths. Each product is floored on its own before the sum,
 * so delta = 15 with the defaults gives 5 + 7 + 45 = 57 (not 57.5 or 58).
 */
export function quadraticFee(
  config: Pick<QuadraticPoolConfig, 'baseFee' | 'maxFee' | 'k1' | 'k2'>,
  delta: bigint,
): { feeBps: number; clamp: 'fee_floor' | 'fee_ceiling' | null } {
  const base = BigInt(config.baseFee);
  const max = BigInt(config.maxFee);
  const raw = base + mulFixed(delta, config.k1) + mulFixed(delta * delta, config.k2);

  const fee = clampBigInt(raw, base, max);
  const clamp = raw > max ? 'fee_ceiling' : raw < base ? 'fee_floor' : null;
  return { feeBps: Number(fee), clamp };
}

function assess(
  config: QuadraticPoolConfig,
  metrics: PoolMetrics,
  tradeSize: bigint,
  currentMetric: bigint | null,
): FeeAssessment {
  const snapshot = deriveMetrics(metrics, tradeSize, currentMetric, config);
  const why: WhyRule[] = [...snapshot.why, 'quadratic_formula'];

  const { feeBps, clamp } = quadraticFee(config, snapshot.impact);
  if (clamp) why.push(clamp);

  return {
    model: 'quadratic',
    feeBps,
    metrics: snapshot,
    score: null,
    tier: null,
    why,
  };
}

export const quadraticStrategy: RiskFeeStrategy<QuadraticPoolConfig> = {
  model: 'quadratic',
  assess,
  computeFee(config, metrics, tradeSize, currentMetric) {
    return assess(config, metrics, tradeSize, currentMetric).feeBps;
  },
};
