/** Coefficients stored in tenths; products are divided by this before summing. */
export const FIXED_POINT_SCALE = 10n;

export function absBigInt(value: bigint): bigint {
  return value < 0n ? -value : value;
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function clampBigInt(value: bigint, min: bigint, max: bigint): bigint {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Multiplies an integer by a coefficient expressed in tenths.
 * Rounds toward zero, which is floor for the non-negative inputs the engine uses.
 */
export function mulFixed(value: bigint, coefficientTenths: number): bigint {
  return (value * BigInt(coefficientTenths)) / FIXED_POINT_SCALE;
}

/** Renders bigint fields as strings so log payloads stay JSON-safe. */
export function stringifyBigInts(input: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    out[key] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}
