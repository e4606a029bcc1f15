import type { PoolConfig, PoolId, PoolMetrics } from '@tickguard/shared';

/**
 * Backing storage for per-pool state. Synchronous by contract: the engine never
 * suspends between reading and writing a pool. A host that keeps state in an
 * external key-value store loads it into an implementation of this type.
 */
export type PoolStateStore = {
  getConfig(pool: PoolId): PoolConfig | null;
  setConfig(pool: PoolId, config: PoolConfig): void;
  getMetrics(pool: PoolId): PoolMetrics | null;
  setMetrics(pool: PoolId, metrics: PoolMetrics): void;
};

export class MemoryPoolStateStore implements PoolStateStore {
  private readonly configs = new Map<PoolId, PoolConfig>();
  private readonly metrics = new Map<PoolId, PoolMetrics>();

  getConfig(pool: PoolId): PoolConfig | null {
    const config = this.configs.get(pool);
    return config ? { ...config } : null;
  }

  setConfig(pool: PoolId, config: PoolConfig): void {
    this.configs.set(pool, { ...config });
  }

  getMetrics(pool: PoolId): PoolMetrics | null {
    const metrics = this.metrics.get(pool);
    return metrics ? { ...metrics } : null;
  }

  setMetrics(pool: PoolId, metrics: PoolMetrics): void {
    this.metrics.set(pool, { ...metrics });
  }

  get size(): number {
    return new Set([...this.configs.keys(), ...this.metrics.keys()]).size;
  }
}
