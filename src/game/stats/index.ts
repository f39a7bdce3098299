/**
 * Stats Module Exports
 * Session and lifetime poker statistics
 */

// Counters and derived values
export * from './StatsTypes';
export * from './StatDefinitions';

// Aggregation
export * from './StatsAggregator';
