import {
  ConfigError,
  MAX_FEE_BPS,
  type ConfigErrorCode,
  PoolConfigInputSchema,
  type ImpactSettings,
  type PoolConfig,
} from '@tickguard/shared';

import type { ConfigResult } from './types';

function fail(error: ConfigError): ConfigResult {
  return { ok: false, error };
}

const FEE_FIELDS = new Set(['feeLow', 'feeMed', 'feeHigh', 'baseFee', 'maxFee']);
const THRESHOLD_FIELDS = new Set(['thresholdLow', 'thresholdHigh']);

// Malformed fees and thresholds keep their own codes; anything else that shapes
// the fee curve (weights, coefficients, impact settings, model) is a fee range error.
function codeForField(field: string): ConfigErrorCode {
  if (FEE_FIELDS.has(field)) return 'FEE_OUT_OF_BOUNDS';
  if (THRESHOLD_FIELDS.has(field)) return 'INVALID_THRESHOLD_ORDER';
  return 'INVALID_FEE_RANGE';
}

function feesOf(config: PoolConfig): Array<[string, number]> {
  if (config.model === 'discrete') {
    return [
      ['feeLow', config.feeLow],
      ['feeMed', config.feeMed],
      ['feeHigh', config.feeHigh],
    ];
  }
  return [
    ['baseFee', config.baseFee],
    ['maxFee', config.maxFee],
  ];
}

/**
 * Checks a candidate pool config. Pure: the caller decides whether to store the
 * result. Omitted impact settings are filled from `impactDefaults`.
 *
 * Order of checks: shape, fee bounds, fee ordering, threshold ordering.
 */
export function validatePoolConfig(params: unknown, impactDefaults: ImpactSettings): ConfigResult {
  const parsed = PoolConfigInputSchema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    const field = String(parsed.error.issues[0]?.path[0] ?? '');
    return fail(new ConfigError({ code: codeForField(field), message: 'invalid_pool_config', issues }));
  }

  const config: PoolConfig = {
    ...parsed.data,
    impactUnit: parsed.data.impactUnit ?? impactDefaults.impactUnit,
    priceImpactDivisor: parsed.data.priceImpactDivisor ?? impactDefaults.priceImpactDivisor,
    spikeThreshold: parsed.data.spikeThreshold ?? impactDefaults.spikeThreshold,
  };

  const outOfBounds = feesOf(config).filter(([, fee]) => fee <= 0 || fee > MAX_FEE_BPS);
  if (outOfBounds.length > 0) {
    return fail(
      new ConfigError({
        code: 'FEE_OUT_OF_BOUNDS',
        message: `fees must lie in (0, ${MAX_FEE_BPS}] bps`,
        issues: outOfBounds.map(([name, fee]) => `${name}: ${fee}`),
      }),
    );
  }

  if (config.model === 'discrete') {
    if (!(config.feeLow < config.feeMed && config.feeMed < config.feeHigh)) {
      return fail(
        new ConfigError({
          code: 'INVALID_FEE_RANGE',
          message: 'expected feeLow < feeMed < feeHigh',
          issues: [`feeLow=${config.feeLow}`, `feeMed=${config.feeMed}`, `feeHigh=${config.feeHigh}`],
        }),
      );
    }
    if (config.thresholdLow >= config.thresholdHigh) {
      return fail(
        new ConfigError({
          code: 'INVALID_THRESHOLD_ORDER',
          message: 'expected thresholdLow < thresholdHigh',
          issues: [`thresholdLow=${config.thresholdLow}`, `thresholdHigh=${config.thresholdHigh}`],
        }),
      );
    }
  } else if (config.maxFee <= config.baseFee) {
    return fail(
      new ConfigError({
        code: 'INVALID_FEE_RANGE',
        message: 'expected maxFee > baseFee',
        issues: [`baseFee=${config.baseFee}`, `maxFee=${config.maxFee}`],
      }),
    );
  }

  return { ok: true, config };
}
