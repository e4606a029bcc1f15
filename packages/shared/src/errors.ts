export type ConfigErrorCode =
  | 'FEE_OUT_OF_BOUNDS'
  | 'INVALID_FEE_RANGE'
  | 'INVALID_THRESHOLD_ORDER';

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly pool: string | null;
  public readonly issues: string[];

  constructor(input: { code: ConfigErrorCode; message: string; pool?: string | null; issues?: string[] }) {
    super(input.message);
    this.name = 'ConfigError';
    this.code = input.code;
    this.pool = input.pool ?? null;
    this.issues = input.issues ?? [];
  }

  withPool(pool: string): ConfigError {
    return new ConfigError({ code: this.code, message: this.message, pool, issues: this.issues });
  }
}
