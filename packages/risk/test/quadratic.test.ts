import { describe, expect, it } from 'vitest';

import { emptyPoolMetrics } from '@tickguard/shared';

import { defaultQuadraticConfig } from '../src/defaults';
import { quadraticFee, quadraticStrategy } from '../src/quadratic';

const config = defaultQuadraticConfig();

describe('quadraticFee', () => {
  it('charges baseFee when nothing moved', () => {
    expect(quadraticFee(config, 0n)).toEqual({ feeBps: 5, clamp: null });
  });

  it('delta 10 => 5 + 5 + 20', () => {
    expect(quadraticFee(config, 10n)).toEqual({ feeBps: 30, clamp: null });
  });

  it('delta 15 floors each term: 5 + 7 + 45 = 57', () => {
    expect(quadraticFee(config, 15n).feeBps).toBe(57);
  });

  it('clamps to maxFee', () => {
    expect(quadraticFee(config, 20n)).toEqual({ feeBps: 60, clamp: 'fee_ceiling' });
    expect(quadraticFee(config, 10n ** 40n).feeBps).toBe(60);
  });

  it('is non-decreasing in delta and stays within [baseFee, maxFee]', () => {
    let previous = 0;
    for (let d = 0n; d <= 40n; d++) {
      const { feeBps } = quadraticFee(config, d);
      expect(feeBps).toBeGreaterThanOrEqual(previous);
      expect(feeBps).toBeGreaterThanOrEqual(config.baseFee);
      expect(feeBps).toBeLessThanOrEqual(config.maxFee);
      previous = feeBps;
    }
  });

  it('grows faster than the linear term alone below the cap', () => {
    // fee(d2) - fee(d1) > k1 * (d2 - d1), compared in tenths.
    for (let d1 = 1n; d1 < 15n; d1++) {
      for (let d2 = d1 + 1n; d2 <= 15n; d2++) {
        const diff = BigInt(quadraticFee(config, d2).feeBps - quadraticFee(config, d1).feeBps);
        expect(diff * 10n > BigInt(config.k1) * (d2 - d1)).toBe(true);
      }
    }
  });
});

describe('quadraticStrategy', () => {
  it('cold start => baseFee', () => {
    const out = quadraticStrategy.assess(config, emptyPoolMetrics(), 100n, 42n);
    expect(out.feeBps).toBe(5);
    expect(out.score).toBeNull();
    expect(out.tier).toBeNull();
    expect(out.why).toEqual(['cold_start_size', 'cold_start_impact', 'quadratic_formula']);
  });

  it('ignores trade size and prices the tick move', () => {
    const metrics = { ...emptyPoolMetrics(), lastObservedMetric: 100n, averageTradeSize: 10n };
    expect(quadraticStrategy.computeFee(config, metrics, 1n, 110n)).toBe(30);
    expect(quadraticStrategy.computeFee(config, metrics, 10_000n, 110n)).toBe(30);
    expect(quadraticStrategy.computeFee(config, metrics, 10_000n, 85n)).toBe(57);
  });
});
