import {
  emptyPoolMetrics,
  createLogger,
  stringifyBigInts,
  type PoolConfig,
  type PoolConfigInput,
  type PoolId,
  type PoolMetrics,
} from '@tickguard/shared';

import { defaultDiscreteConfig, impactSettingsOf } from './defaults';
import { MemoryPoolStateStore } from './store';
import { assessFee } from './strategy';
import type { ConfigResult, FeeAssessment, FeeEngine, FeeEngineOptions } from './types';
import { applyTrade } from './updater';
import { validatePoolConfig } from './validation';

function resolveDefaults(candidate: PoolConfig | undefined): PoolConfig {
  if (!candidate) return defaultDiscreteConfig();
  const result = validatePoolConfig(candidate, impactSettingsOf(candidate));
  if (!result.ok) throw result.error;
  return result.config;
}

/**
 * Builds an engine over `options.store` (in-memory by default).
 * Throws the `ConfigError` if `options.defaults` is not a valid pool config.
 */
export function createFeeEngine(options: FeeEngineOptions = {}): FeeEngine {
  const store = options.store ?? new MemoryPoolStateStore();
  const defaults = resolveDefaults(options.defaults);
  const base = options.logger ?? createLogger({ environment: process.env['NODE_ENV'] ?? 'development' });
  const log = base.child({ module: 'fee-engine' });

  function configFor(pool: PoolId): PoolConfig {
    return store.getConfig(pool) ?? { ...defaults };
  }

  function metricsFor(pool: PoolId): PoolMetrics {
    return store.getMetrics(pool) ?? emptyPoolMetrics();
  }

  function assess(pool: PoolId, currentMetric: bigint | null, tradeSize: bigint): FeeAssessment {
    const assessment = assessFee(configFor(pool), metricsFor(pool), tradeSize, currentMetric);

    log.debug(
      {
        event: 'fee_evaluated',
        pool,
        model: assessment.model,
        feeBps: assessment.feeBps,
        score: assessment.score,
        tier: assessment.tier,
        ...stringifyBigInts({
          tradeSize,
          currentMetric,
          relativeSize: assessment.metrics.relativeSize,
          impact: assessment.metrics.impact,
          spikeCount: assessment.metrics.spikeCount,
        }),
        why: assessment.why,
      },
      'Fee evaluated',
    );

    return assessment;
  }

  return {
    assess,

    evaluate(pool, currentMetric, tradeSize): number {
      return assess(pool, currentMetric, tradeSize).feeBps;
    },

    record(pool, currentMetric, tradeSize): PoolMetrics {
      const before = metricsFor(pool);
      const after = applyTrade(before, { size: tradeSize, resultingMetric: currentMetric }, configFor(pool));

      if (after === before) {
        log.debug(
          { event: 'trade_skipped', pool, ...stringifyBigInts({ tradeSize, currentMetric }) },
          'Degenerate trade left pool state unchanged',
        );
        return before;
      }

      store.setMetrics(pool, after);
      log.debug(
        {
          event: 'trade_recorded',
          pool,
          consecutiveSpikeCount: after.consecutiveSpikeCount,
          ...stringifyBigInts({
            tradeSize: after.lastTradeSize,
            averageTradeSize: after.averageTradeSize,
            lastObservedMetric: after.lastObservedMetric,
          }),
        },
        'Trade recorded',
      );
      return after;
    },

    setConfig(pool, params: PoolConfigInput): ConfigResult {
      const result = validatePoolConfig(params, impactSettingsOf(defaults));
      if (!result.ok) {
        const error = result.error.withPool(pool);
        log.warn(
          { event: 'pool_config_rejected', pool, code: error.code, issues: error.issues },
          error.message,
        );
        return { ok: false, error };
      }

      store.setConfig(pool, result.config);
      log.info({ event: 'pool_configured', pool, model: result.config.model }, 'Pool configured');
      return result;
    },

    getConfig: configFor,

    getConfigState(pool) {
      return store.getConfig(pool) === null ? 'unconfigured' : 'configured';
    },

    getMetrics: metricsFor,

    initializePool(pool): PoolMetrics {
      const existing = store.getMetrics(pool);
      if (existing) return existing;
      const metrics = emptyPoolMetrics();
      store.setMetrics(pool, metrics);
      log.debug({ event: 'pool_initialized', pool }, 'Pool initialized');
      return metrics;
    },
  };
}
