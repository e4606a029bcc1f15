import { describe, expect, it } from 'vitest';

import { emptyPoolMetrics, type PoolMetrics } from '@tickguard/shared';

import { applyTrade, nextAverageTradeSize, nextSpikeCount } from '../src/updater';

const settings = { spikeThreshold: 5 };

function warm(overrides: Partial<PoolMetrics> = {}): PoolMetrics {
  return {
    lastObservedMetric: 10n,
    lastTradeSize: 100n,
    averageTradeSize: 100n,
    consecutiveSpikeCount: 0,
    ...overrides,
  };
}

describe('nextAverageTradeSize', () => {
  it('seeds the average with the first trade', () => {
    expect(nextAverageTradeSize(0n, 100n)).toBe(100n);
  });

  it('weights history 90% and the latest trade 10%, flooring', () => {
    expect(nextAverageTradeSize(100n, 200n)).toBe(110n);
    expect(nextAverageTradeSize(100n, 5n)).toBe(90n);
    expect(nextAverageTradeSize(1n, 1n)).toBe(1n);
  });
});

describe('nextSpikeCount', () => {
  it('counts a trade strictly above the threshold', () => {
    expect(nextSpikeCount({ averageTradeSize: 100n, consecutiveSpikeCount: 2 }, 600n, 5)).toBe(3);
  });

  it('does not count a trade exactly at the threshold', () => {
    expect(nextSpikeCount({ averageTradeSize: 100n, consecutiveSpikeCount: 2 }, 500n, 5)).toBe(0);
    expect(nextSpikeCount({ averageTradeSize: 100n, consecutiveSpikeCount: 2 }, 599n, 5)).toBe(0);
  });

  it('never counts a cold-start trade', () => {
    expect(nextSpikeCount({ averageTradeSize: 0n, consecutiveSpikeCount: 0 }, 10n ** 20n, 5)).toBe(0);
  });

  it('saturates at 255', () => {
    expect(nextSpikeCount({ averageTradeSize: 100n, consecutiveSpikeCount: 255 }, 1_000n, 5)).toBe(255);
  });
});

describe('applyTrade', () => {
  it('initializes an empty pool', () => {
    expect(applyTrade(emptyPoolMetrics(), { size: 100n, resultingMetric: 42n }, settings)).toEqual({
      lastObservedMetric: 42n,
      lastTradeSize: 100n,
      averageTradeSize: 100n,
      consecutiveSpikeCount: 0,
    });
  });

  it('updates every field after a spike', () => {
    expect(applyTrade(warm({ consecutiveSpikeCount: 1 }), { size: 700n, resultingMetric: -3n }, settings)).toEqual({
      lastObservedMetric: -3n,
      lastTradeSize: 700n,
      averageTradeSize: 160n,
      consecutiveSpikeCount: 2,
    });
  });

  it('accepts tick 0 as a valid observation', () => {
    expect(applyTrade(warm(), { size: 100n, resultingMetric: 0n }, settings).lastObservedMetric).toBe(0n);
  });

  it('reads a negative size as its magnitude', () => {
    const out = applyTrade(warm(), { size: -200n, resultingMetric: 11n }, settings);
    expect(out.lastTradeSize).toBe(200n);
    expect(out.averageTradeSize).toBe(110n);
  });

  it('skips zero-size trades entirely', () => {
    const before = warm({ consecutiveSpikeCount: 4 });
    expect(applyTrade(before, { size: 0n, resultingMetric: 99n }, settings)).toBe(before);
  });

  it('skips trades without a post-trade metric', () => {
    const before = warm();
    expect(applyTrade(before, { size: 500n, resultingMetric: null }, settings)).toBe(before);
  });
});
