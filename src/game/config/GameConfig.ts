/**
 * GameConfig.ts
 * Immutable session configuration
 *
 * Stack sizes are given in big blinds; blinds themselves are fixed at 1/2.
 */

import { z } from 'zod';
import { MAX_SEED } from '../engine/Random';
import { DEFAULT_BIG_BLIND } from '../engine/GameLoop';
import { ConfigError, ConfigErrors } from './ConfigErrors';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_STACK_BB = 100;
export const DEFAULT_AGGRESSION = 0.5;

/** Largest stack whose chips, summed over both seats, stay exact integers */
export const MAX_STACK_BB = Math.floor(Number.MAX_SAFE_INTEGER / (DEFAULT_BIG_BLIND * 2));

// ============================================================================
// Schema
// ============================================================================

export const gameConfigSchema = z
  .object({
    /** Starting stack in big blinds */
    stack: z
      .number()
      .int('must be a whole number of big blinds')
      .positive('must be greater than zero')
      .max(MAX_STACK_BB, `must be at most ${MAX_STACK_BB} big blinds`)
      .default(DEFAULT_STACK_BB),
    /** 0 = passive, 1 = aggressive */
    aggression: z
      .number()
      .finite()
      .min(0, 'must be between 0 and 1')
      .max(1, 'must be between 0 and 1')
      .default(DEFAULT_AGGRESSION),
    seed: z
      .number()
      .int('must be a whole number')
      .min(0, 'must not be negative')
      .max(MAX_SEED, 'must fit in 32 bits')
      .optional(),
  })
  .strict();

export type GameConfigInput = z.input<typeof gameConfigSchema>;
export type GameConfig = Readonly<z.output<typeof gameConfigSchema>>;

// ============================================================================
// Parsing
// ============================================================================

function fieldValue(input: unknown, field: string | number | undefined): unknown {
  const record = z.record(z.unknown()).safeParse(input);
  return record.success && field !== undefined ? record.data[String(field)] : undefined;
}

function toConfigError(input: unknown, issue: z.ZodIssue): ConfigError {
  const field = issue.path[0];
  const value = fieldValue(input, field);
  switch (field) {
    case 'stack':
      return ConfigErrors.invalidStack(value, issue.message);
    case 'aggression':
      return ConfigErrors.invalidAggression(value, issue.message);
    case 'seed':
      return ConfigErrors.invalidSeed(value, issue.message);
    default:
      return ConfigErrors.invalidConfigSchema(issue.message);
  }
}

/**
 * Validate startup parameters, filling in defaults
 *
 * @throws ConfigError naming the first invalid field
 */
export function parseGameConfig(input: unknown = {}): GameConfig {
  const parsed = gameConfigSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw toConfigError(input, issue);
  }
  return Object.freeze({ ...parsed.data });
}

export function getStartingChips(config: GameConfig): number {
  return config.stack * DEFAULT_BIG_BLIND;
}
