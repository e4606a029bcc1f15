import type { PoolConfig, PoolMetrics } from '@tickguard/shared';

import { discreteStrategy } from './discrete';
import { quadraticStrategy } from './quadratic';
import type { FeeAssessment } from './types';

export function assessFee(
  config: PoolConfig,
  metrics: PoolMetrics,
  tradeSize: bigint,
  currentMetric: bigint | null,
): FeeAssessment {
  switch (config.model) {
    case 'discrete':
      return discreteStrategy.assess(config, metrics, tradeSize, currentMetric);
    case 'quadratic':
      return quadraticStrategy.assess(config, metrics, tradeSize, currentMetric);
  }
}

export function computeFee(
  config: PoolConfig,
  metrics: PoolMetrics,
  tradeSize: bigint,
  currentMetric: bigint | null,
): number {
  return assessFee(config, metrics, tradeSize, currentMetric).feeBps;
}
