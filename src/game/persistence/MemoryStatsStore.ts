/**
 * MemoryStatsStore.ts
 * In-memory implementation of StatsStore
 *
 * Keeps the serialized record so loading goes through the same parsing and
 * checksum checks as the file store. All data is lost on process restart.
 */

import { LifetimeCounters, createEmptyLifetimeCounters } from '../stats/StatsTypes';
import {
  StatsStore,
  StoreResult,
  LoadStatsResult,
  PersistenceCorruptError,
  createPersistedStats,
  parsePersistedStats,
  serializePersistedStats,
} from './PersistenceTypes';

export class MemoryStatsStore implements StatsStore {
  private raw: string | null;

  constructor(initialRaw: string | null = null) {
    this.raw = initialRaw;
  }

  async loadLifetimeStats(): Promise<LoadStatsResult> {
    if (this.raw === null) {
      return { counters: createEmptyLifetimeCounters(), warning: null };
    }
    try {
      return { counters: parsePersistedStats(this.raw), warning: null };
    } catch (error) {
      if (error instanceof PersistenceCorruptError) {
        return { counters: createEmptyLifetimeCounters(), warning: error };
      }
      throw error;
    }
  }

  async saveLifetimeStats(counters: LifetimeCounters): Promise<StoreResult> {
    this.raw = serializePersistedStats(createPersistedStats(counters));
    return { success: true };
  }

  async clear(): Promise<StoreResult> {
    this.raw = null;
    return { success: true };
  }

  /** Stored text, for inspection */
  getRaw(): string | null {
    return this.raw;
  }
}

export function createMemoryStatsStore(initialRaw: string | null = null): MemoryStatsStore {
  return new MemoryStatsStore(initialRaw);
}
