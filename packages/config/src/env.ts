import { z } from 'zod';

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

  // Observability
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Defaults for pools that have not been configured explicitly
  FEE_MODEL: z.enum(['discrete', 'quadratic']).default('discrete'),
  IMPACT_UNIT: z.enum(['tick', 'price']).default('tick'),
  // Integer string; one impact unit per this many price units.
  PRICE_IMPACT_DIVISOR: z
    .string()
    .trim()
    .regex(/^[1-9][0-9]*$/, 'Expected a positive integer string')
    .default('10000000000000000'),
  SPIKE_THRESHOLD: z.coerce.number().int().min(1).max(9).default(5),
});

export type Env = z.infer<typeof EnvSchema>;

export type EngineSettings = {
  defaultModel: Env['FEE_MODEL'];
  impactUnit: Env['IMPACT_UNIT'];
  priceImpactDivisor: bigint;
  spikeThreshold: number;
};

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  logging: {
    level: Env['LOG_LEVEL'];
  };
  engine: EngineSettings;
};

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(input);
}

export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = loadEnv(input);
  return {
    nodeEnv: env.NODE_ENV,
    logging: {
      level: env.LOG_LEVEL,
    },
    engine: {
      defaultModel: env.FEE_MODEL,
      impactUnit: env.IMPACT_UNIT,
      priceImpactDivisor: BigInt(env.PRICE_IMPACT_DIVISOR),
      spikeThreshold: env.SPIKE_THRESHOLD,
    },
  };
}
