import type { EngineSettings } from '@tickguard/config';
import {
  DEFAULT_PRICE_IMPACT_DIVISOR,
  DEFAULT_SPIKE_THRESHOLD,
  type DiscretePoolConfig,
  type FeeModel,
  type ImpactSettings,
  type PoolConfig,
  type QuadraticPoolConfig,
} from '@tickguard/shared';

export const DEFAULT_IMPACT_SETTINGS: ImpactSettings = {
  impactUnit: 'tick',
  priceImpactDivisor: DEFAULT_PRICE_IMPACT_DIVISOR,
  spikeThreshold: DEFAULT_SPIKE_THRESHOLD,
};

export function defaultDiscreteConfig(impact: ImpactSettings = DEFAULT_IMPACT_SETTINGS): DiscretePoolConfig {
  return {
    model: 'discrete',
    feeLow: 5,
    feeMed: 20,
    feeHigh: 60,
    thresholdLow: 50,
    thresholdHigh: 150,
    w1: 50,
    w2: 30,
    w3: 20,
    ...impact,
  };
}

export function defaultQuadraticConfig(impact: ImpactSettings = DEFAULT_IMPACT_SETTINGS): QuadraticPoolConfig {
  return {
    model: 'quadratic',
    baseFee: 5,
    maxFee: 60,
    k1: 5,
    k2: 2,
    ...impact,
  };
}

export function defaultPoolConfig(model: FeeModel, impact: ImpactSettings = DEFAULT_IMPACT_SETTINGS): PoolConfig {
  return model === 'quadratic' ? defaultQuadraticConfig(impact) : defaultDiscreteConfig(impact);
}

export function impactSettingsOf(config: PoolConfig): ImpactSettings {
  return {
    impactUnit: config.impactUnit,
    priceImpactDivisor: config.priceImpactDivisor,
    spikeThreshold: config.spikeThreshold,
  };
}

export function engineDefaultsFromConfig(settings: EngineSettings): PoolConfig {
  return defaultPoolConfig(settings.defaultModel, {
    impactUnit: settings.impactUnit,
    priceImpactDivisor: settings.priceImpactDivisor,
    spikeThreshold: settings.spikeThreshold,
  });
}
