import { z } from 'zod';

export const PoolIdSchema = z.string().min(1);
export type PoolId = z.infer<typeof PoolIdSchema>;

export const FeeModelSchema = z.enum(['discrete', 'quadratic']);
export type FeeModel = z.infer<typeof FeeModelSchema>;

export const ImpactUnitSchema = z.enum(['tick', 'price']);
export type ImpactUnit = z.infer<typeof ImpactUnitSchema>;

/** Upper bound of any fee, in basis points (100%). */
export const MAX_FEE_BPS = 10_000;

/** Ratios and normalized impacts are capped here before scoring. */
export const RELATIVE_SIZE_CAP = 10n;
export const IMPACT_CAP = 10n;
export const SPIKE_SCORE_CAP = 10n;

/** Stored spike counter saturates here (uint8 semantics). */
export const SPIKE_COUNTER_MAX = 255;

export const RISK_SCORE_MAX = 255;

/** One impact unit per 0.01 of an 18-decimal price. */
export const DEFAULT_PRICE_IMPACT_DIVISOR = 10n ** 16n;
export const DEFAULT_SPIKE_THRESHOLD = 5;

const BpsSchema = z.number().int();
const WeightSchema = z.number().int().nonnegative();

export const ImpactSettingsSchema = z.object({
  impactUnit: ImpactUnitSchema,
  priceImpactDivisor: z.bigint().positive(),
  // relativeSize never exceeds RELATIVE_SIZE_CAP, so 10 or more would never fire.
  spikeThreshold: z.number().int().min(1).max(Number(RELATIVE_SIZE_CAP) - 1),
});

export type ImpactSettings = z.infer<typeof ImpactSettingsSchema>;

export const DiscretePoolConfigSchema = ImpactSettingsSchema.extend({
  model: z.literal('discrete'),
  feeLow: BpsSchema,
  feeMed: BpsSchema,
  feeHigh: BpsSchema,
  thresholdLow: z.number().int().min(0).max(RISK_SCORE_MAX),
  thresholdHigh: z.number().int().min(0).max(RISK_SCORE_MAX),
  w1: WeightSchema,
  w2: WeightSchema,
  w3: WeightSchema,
});

export type DiscretePoolConfig = z.infer<typeof DiscretePoolConfigSchema>;

export const QuadraticPoolConfigSchema = ImpactSettingsSchema.extend({
  model: z.literal('quadratic'),
  baseFee: BpsSchema,
  maxFee: BpsSchema,
  /** Linear coefficient in tenths (5 => 0.5). */
  k1: WeightSchema,
  /** Quadratic coefficient in tenths (2 => 0.2). */
  k2: WeightSchema,
});

export type QuadraticPoolConfig = z.infer<typeof QuadraticPoolConfigSchema>;

export const PoolConfigSchema = z.discriminatedUnion('model', [
  DiscretePoolConfigSchema,
  QuadraticPoolConfigSchema,
]);

export type PoolConfig = z.infer<typeof PoolConfigSchema>;

/**
 * What an admin passes to `setConfig`. Impact settings may be omitted and are
 * then taken from the engine defaults.
 */
export const PoolConfigInputSchema = z.discriminatedUnion('model', [
  DiscretePoolConfigSchema.partial({ impactUnit: true, priceImpactDivisor: true, spikeThreshold: true }),
  QuadraticPoolConfigSchema.partial({ impactUnit: true, priceImpactDivisor: true, spikeThreshold: true }),
]);

export type PoolConfigInput = z.infer<typeof PoolConfigInputSchema>;

export const PoolMetricsSchema = z.object({
  lastObservedMetric: z.bigint().nullable(),
  lastTradeSize: z.bigint().nonnegative(),
  averageTradeSize: z.bigint().nonnegative(),
  consecutiveSpikeCount: z.number().int().min(0).max(SPIKE_COUNTER_MAX),
});

export type PoolMetrics = z.infer<typeof PoolMetricsSchema>;

export const TradeSchema = z.object({
  size: z.bigint(),
  resultingMetric: z.bigint().nullable(),
});

export type Trade = z.infer<typeof TradeSchema>;

export function emptyPoolMetrics(): PoolMetrics {
  return {
    lastObservedMetric: null,
    lastTradeSize: 0n,
    averageTradeSize: 0n,
    consecutiveSpikeCount: 0,
  };
}
