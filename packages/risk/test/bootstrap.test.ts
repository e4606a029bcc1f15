import { describe, expect, it } from 'vitest';

import { createFeeEngineFromEnv } from '../src/bootstrap';
import { MemoryPoolStateStore } from '../src/store';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  return {
    lines,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

describe('createFeeEngineFromEnv', () => {
  it('uses the env-selected model as the default pool config', () => {
    const { destination } = capture();
    const { engine, config } = createFeeEngineFromEnv(
      { NODE_ENV: 'test', LOG_LEVEL: 'silent', FEE_MODEL: 'quadratic', SPIKE_THRESHOLD: '7' },
      { destination },
    );

    expect(config.engine.defaultModel).toBe('quadratic');
    expect(engine.getConfig('pool-a')).toMatchObject({ model: 'quadratic', baseFee: 5, maxFee: 60, spikeThreshold: 7 });
    expect(engine.evaluate('pool-a', 100n, 1_000n)).toBe(5);
  });

  it('applies LOG_LEVEL and NODE_ENV to the engine logger', () => {
    const { lines, destination } = capture();
    const { logger, engine } = createFeeEngineFromEnv({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }, { destination });

    expect(logger.level).toBe('warn');
    engine.evaluate('pool-a', 1n, 100n);
    engine.setConfig('pool-a', { model: 'quadratic', baseFee: 60, maxFee: 5, k1: 5, k2: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: 'pool_config_rejected',
      module: 'fee-engine',
      env: 'production',
      code: 'INVALID_FEE_RANGE',
      pool: 'pool-a',
    });
  });

  it('announces startup at info level', () => {
    const { lines, destination } = capture();
    createFeeEngineFromEnv({ NODE_ENV: 'test', LOG_LEVEL: 'info', IMPACT_UNIT: 'price' }, { destination });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ event: 'engine_started', defaultModel: 'discrete', impactUnit: 'price' });
  });

  it('keeps state in the supplied store', () => {
    const store = new MemoryPoolStateStore();
    const { destination } = capture();
    const { engine } = createFeeEngineFromEnv({ NODE_ENV: 'test', LOG_LEVEL: 'silent' }, { store, destination });
    engine.record('pool-a', 10n, 100n);
    expect(store.getMetrics('pool-a')?.averageTradeSize).toBe(100n);
  });

  it('throws on a malformed environment', () => {
    expect(() => createFeeEngineFromEnv({ SPIKE_THRESHOLD: '42', LOG_LEVEL: 'silent' })).toThrow();
  });
});
