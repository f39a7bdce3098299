/**
 * PersistenceTypes.ts
 * Persisted lifetime stats: record format, schema, errors and store interface
 *
 * On disk the record is { version, savedAt, checksum, stats }. The checksum
 * covers everything except itself.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { LifetimeCounters } from '../stats/StatsTypes';

// ============================================================================
// Record Format
// ============================================================================

export const STATS_FORMAT_VERSION = 1;

export const STATS_DIRECTORY_NAME = 'heads-up-holdem';
export const STATS_FILE_NAME = 'stats.json';

const countSchema = z.number().int().nonnegative();

export const lifetimeCountersSchema = z.object({
  handsPlayed: countSchema,
  vpipHands: countSchema,
  pfrHands: countSchema,
  threeBetOpportunities: countSchema,
  threeBetHands: countSchema,
  cbetOpportunities: countSchema,
  cbetHands: countSchema,
  foldToCbetOpportunities: countSchema,
  foldToCbetHands: countSchema,
  sawFlopHands: countSchema,
  wentToShowdownHands: countSchema,
  wonAtShowdownHands: countSchema,
  postflopBets: countSchema,
  postflopRaises: countSchema,
  postflopCalls: countSchema,
  netBigBlinds: z.number().finite(),
  biggestPotWon: countSchema,
  biggestPotLost: countSchema,
  sessions: countSchema,
});

export const persistedStatsSchema = z.object({
  version: z.literal(STATS_FORMAT_VERSION),
  savedAt: z.string(),
  checksum: z.string(),
  stats: lifetimeCountersSchema,
});

export type PersistedStats = z.infer<typeof persistedStatsSchema>;

// ============================================================================
// Errors
// ============================================================================

export enum PersistenceErrorCode {
  MALFORMED_JSON = 'MALFORMED_JSON',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  CHECKSUM_MISMATCH = 'CHECKSUM_MISMATCH',
  READ_FAILED = 'READ_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
}

export class PersistenceError extends Error {
  readonly code: PersistenceErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: PersistenceErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PersistenceError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * The stored record exists but cannot be trusted. Callers fall back to
 * zero counters.
 */
export class PersistenceCorruptError extends PersistenceError {
  constructor(
    code: PersistenceErrorCode.MALFORMED_JSON | PersistenceErrorCode.SCHEMA_MISMATCH | PersistenceErrorCode.CHECKSUM_MISMATCH,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'PersistenceCorruptError';
    Object.setPrototypeOf(this, PersistenceCorruptError.prototype);
  }
}

// ============================================================================
// Store Types
// ============================================================================

/**
 * Result of a store operation
 */
export interface StoreResult {
  readonly success: boolean;
  readonly error?: string;
}

/**
 * Loading never fails: unreadable data yields zero counters and a warning
 */
export interface LoadStatsResult {
  readonly counters: LifetimeCounters;
  readonly warning: PersistenceError | null;
}

export interface StatsStore {
  loadLifetimeStats(): Promise<LoadStatsResult>;
  saveLifetimeStats(counters: LifetimeCounters): Promise<StoreResult>;
  clear(): Promise<StoreResult>;
}

// ============================================================================
// Utility Functions
// ============================================================================

export function calculateChecksum(data: unknown): string {
  const str = JSON.stringify(data);
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash;
  }
  return Math.abs(hash).toString(16).padStart(8, '0');
}

export function createPersistedStats(counters: LifetimeCounters, savedAt: Date = new Date()): PersistedStats {
  // Schema order keeps the checksum stable however the counters were built
  const body: Omit<PersistedStats, 'checksum'> = {
    version: STATS_FORMAT_VERSION,
    savedAt: savedAt.toISOString(),
    stats: lifetimeCountersSchema.parse(counters),
  };
  return { ...body, checksum: calculateChecksum(body) };
}

/**
 * Parse and verify a stored record
 *
 * @throws PersistenceCorruptError when the text is not a valid, intact record
 */
export function parsePersistedStats(raw: string): LifetimeCounters {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new PersistenceCorruptError(
      PersistenceErrorCode.MALFORMED_JSON,
      'Stats file is not valid JSON',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  const parsed = persistedStatsSchema.safeParse(json);
  if (!parsed.success) {
    throw new PersistenceCorruptError(
      PersistenceErrorCode.SCHEMA_MISMATCH,
      'Stats file does not match the expected format',
      { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
    );
  }

  const { checksum, ...body } = parsed.data;
  const expected = calculateChecksum(body);
  if (expected !== checksum) {
    throw new PersistenceCorruptError(
      PersistenceErrorCode.CHECKSUM_MISMATCH,
      'Stats file checksum mismatch - data may be corrupted',
      { expected, actual: checksum }
    );
  }

  const counters: LifetimeCounters = parsed.data.stats;
  return counters;
}

export function serializePersistedStats(record: PersistedStats): string {
  return JSON.stringify(record, null, 2);
}

/**
 * <XDG_DATA_HOME or ~/.local/share>/heads-up-holdem/stats.json
 */
export function resolveStatsPath(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): string {
  const dataHome = env.XDG_DATA_HOME && env.XDG_DATA_HOME.length > 0
    ? env.XDG_DATA_HOME
    : path.join(homeDir, '.local', 'share');
  return path.join(dataHome, STATS_DIRECTORY_NAME, STATS_FILE_NAME);
}
