/**
 * ConfigErrors.ts
 * Typed errors for session startup configuration
 *
 * Every violation names the offending field so the caller can report it.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ConfigErrorCode {
  INVALID_STACK = 'INVALID_STACK',
  INVALID_AGGRESSION = 'INVALID_AGGRESSION',
  INVALID_SEED = 'INVALID_SEED',
  INVALID_CONFIG_SCHEMA = 'INVALID_CONFIG_SCHEMA',
}

// ============================================================================
// Error Class
// ============================================================================

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  /** Field that failed validation, or null for the config as a whole */
  readonly field: string | null;
  readonly details: Record<string, unknown>;

  constructor(
    code: ConfigErrorCode,
    field: string | null,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.field = field;
    this.details = details;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      field: this.field,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Error Factory
// ============================================================================

export const ConfigErrors = {
  invalidStack: (value: unknown, reason: string) =>
    new ConfigError(
      ConfigErrorCode.INVALID_STACK,
      'stack',
      `Invalid stack ${String(value)}: ${reason}`,
      { value, reason }
    ),

  invalidAggression: (value: unknown, reason: string) =>
    new ConfigError(
      ConfigErrorCode.INVALID_AGGRESSION,
      'aggression',
      `Invalid aggression ${String(value)}: ${reason}`,
      { value, reason }
    ),

  invalidSeed: (value: unknown, reason: string) =>
    new ConfigError(
      ConfigErrorCode.INVALID_SEED,
      'seed',
      `Invalid seed ${String(value)}: ${reason}`,
      { value, reason }
    ),

  invalidConfigSchema: (reason: string) =>
    new ConfigError(
      ConfigErrorCode.INVALID_CONFIG_SCHEMA,
      null,
      `Invalid config schema: ${reason}`,
      { reason }
    ),
};
