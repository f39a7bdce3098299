/**
 * FileSystemStatsStore.ts
 * Filesystem-based implementation of StatsStore
 *
 * One pretty-printed JSON file, by default under the user's data directory.
 * Survives process restarts.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LifetimeCounters, createEmptyLifetimeCounters } from '../stats/StatsTypes';
import {
  StatsStore,
  StoreResult,
  LoadStatsResult,
  PersistenceError,
  PersistenceErrorCode,
  createPersistedStats,
  parsePersistedStats,
  serializePersistedStats,
  resolveStatsPath,
} from './PersistenceTypes';

// ============================================================================
// Configuration
// ============================================================================

export interface FileSystemStatsStoreConfig {
  /** Full path of the stats file */
  readonly filePath: string;
}

// ============================================================================
// FileSystemStatsStore Implementation
// ============================================================================

export class FileSystemStatsStore implements StatsStore {
  private readonly filePath: string;

  constructor(config: Partial<FileSystemStatsStoreConfig> = {}) {
    this.filePath = config.filePath ?? resolveStatsPath();
  }

  async loadLifetimeStats(): Promise<LoadStatsResult> {
    if (!fs.existsSync(this.filePath)) {
      return { counters: createEmptyLifetimeCounters(), warning: null };
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      return { counters: parsePersistedStats(raw), warning: null };
    } catch (error) {
      const warning = error instanceof PersistenceError
        ? error
        : new PersistenceError(
            PersistenceErrorCode.READ_FAILED,
            `Could not read stats file: ${error instanceof Error ? error.message : 'Unknown error'}`,
            { filePath: this.filePath }
          );
      console.warn(`[FileSystemStatsStore] ${warning.message}; starting from zero (${this.filePath})`);
      return { counters: createEmptyLifetimeCounters(), warning };
    }
  }

  async saveLifetimeStats(counters: LifetimeCounters): Promise<StoreResult> {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const record = createPersistedStats(counters);
      fs.writeFileSync(this.filePath, serializePersistedStats(record), 'utf-8');
      return { success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`[FileSystemStatsStore] Failed to save stats to ${this.filePath}:`, message);
      return { success: false, error: message };
    }
  }

  async clear(): Promise<StoreResult> {
    try {
      if (fs.existsSync(this.filePath)) {
        fs.rmSync(this.filePath);
      }
      return { success: true };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }
  }
}

export function createFileSystemStatsStore(
  config: Partial<FileSystemStatsStoreConfig> = {}
): FileSystemStatsStore {
  return new FileSystemStatsStore(config);
}
