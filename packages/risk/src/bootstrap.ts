import { loadConfig, type AppConfig } from '@tickguard/config';
import { createLogger, type AppLogger } from '@tickguard/shared';
import type { DestinationStream } from 'pino';

import { engineDefaultsFromConfig } from './defaults';
import { createFeeEngine } from './engine';
import type { PoolStateStore } from './store';
import type { FeeEngine } from './types';

export type FeeEngineRuntime = {
  config: AppConfig;
  logger: AppLogger;
  engine: FeeEngine;
};

/**
 * Wires an engine from environment variables: log level and format from
 * NODE_ENV/LOG_LEVEL, default pool config from FEE_MODEL and the impact settings.
 * Throws a ZodError on a malformed environment.
 */
export function createFeeEngineFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: { store?: PoolStateStore; destination?: DestinationStream } = {},
): FeeEngineRuntime {
  const config = loadConfig(env);
  const logger = createLogger({
    environment: config.nodeEnv,
    level: config.logging.level,
    ...(options.destination ? { destination: options.destination } : {}),
  });

  const engine = createFeeEngine({
    defaults: engineDefaultsFromConfig(config.engine),
    logger,
    ...(options.store ? { store: options.store } : {}),
  });

  logger.info(
    { event: 'engine_started', defaultModel: config.engine.defaultModel, impactUnit: config.engine.impactUnit },
    'Fee engine ready',
  );
  return { config, logger, engine };
}
