import type {
  AppLogger,
  ConfigError,
  FeeModel,
  PoolConfig,
  PoolConfigInput,
  PoolId,
  PoolMetrics,
} from '@tickguard/shared';

import type { PoolStateStore } from './store';

export type WhyRule =
  | 'cold_start_size'
  | 'cold_start_impact'
  | 'size_capped'
  | 'impact_capped'
  | 'spike_history'
  | 'spike_capped'
  | 'score_saturated'
  | 'tier_low'
  | 'tier_medium'
  | 'tier_high'
  | 'quadratic_formula'
  | 'fee_floor'
  | 'fee_ceiling';

export type FeeTier = 'low' | 'medium' | 'high';

export type MetricSnapshot = {
  relativeSize: bigint; // 0..10
  impact: bigint;
  spikeCount: bigint; // 0..10
  why: WhyRule[];
};

export type FeeAssessment = {
  model: FeeModel;
  feeBps: number;
  metrics: MetricSnapshot;
  /** Discrete model only. */
  score: number | null;
  tier: FeeTier | null;
  why: WhyRule[];
};

export type RiskFeeStrategy<C extends PoolConfig = PoolConfig> = {
  readonly model: C['model'];
  assess(config: C, metrics: PoolMetrics, tradeSize: bigint, currentMetric: bigint | null): FeeAssessment;
  computeFee(config: C, metrics: PoolMetrics, tradeSize: bigint, currentMetric: bigint | null): number;
};

export type ConfigResult = { ok: true; config: PoolConfig } | { ok: false; error: ConfigError };

export type ConfigState = 'unconfigured' | 'configured';

export type FeeEngineOptions = {
  store?: PoolStateStore;
  /** Config used by every pool until `setConfig` succeeds for it. */
  defaults?: PoolConfig;
  logger?: AppLogger;
};

/**
 * Per-trade fee engine.
 *
 * Pools are fully isolated. Within one pool the caller must serialize
 * `evaluate(T)` -> settle T -> `record(T)` against any other trade on that
 * pool; the engine holds no locks.
 */
export type FeeEngine = {
  /** Fee in bps for a prospective trade. Does not touch pool state. */
  evaluate(pool: PoolId, currentMetric: bigint | null, tradeSize: bigint): number;
  assess(pool: PoolId, currentMetric: bigint | null, tradeSize: bigint): FeeAssessment;
  /** Folds a settled trade into the pool's history. */
  record(pool: PoolId, currentMetric: bigint | null, tradeSize: bigint): PoolMetrics;
  setConfig(pool: PoolId, params: PoolConfigInput): ConfigResult;
  getConfig(pool: PoolId): PoolConfig;
  getConfigState(pool: PoolId): ConfigState;
  getMetrics(pool: PoolId): PoolMetrics;
  initializePool(pool: PoolId): PoolMetrics;
};
