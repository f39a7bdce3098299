/**
 * Persistence Layer Module Exports
 * Lifetime stats storage
 */

// Types
export {
  // Record Format
  STATS_FORMAT_VERSION,
  STATS_DIRECTORY_NAME,
  STATS_FILE_NAME,
  PersistedStats,
  lifetimeCountersSchema,
  persistedStatsSchema,
  // Errors
  PersistenceErrorCode,
  PersistenceError,
  PersistenceCorruptError,
  // Store Types
  StoreResult,
  LoadStatsResult,
  StatsStore,
  // Utilities
  calculateChecksum,
  createPersistedStats,
  parsePersistedStats,
  serializePersistedStats,
  resolveStatsPath,
} from './PersistenceTypes';

// Memory Store
export {
  MemoryStatsStore,
  createMemoryStatsStore,
} from './MemoryStatsStore';

// File System Store
export {
  FileSystemStatsStore,
  createFileSystemStatsStore,
  FileSystemStatsStoreConfig,
} from './FileSystemStatsStore';
