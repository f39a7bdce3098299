/**
 * Game Module
 *
 * Heads-up Hold'em engine, bot, stats and session controller.
 */

// Core engine
export * from './engine';

// Startup configuration
export * from './config';

// Statistics
export * from './stats';

// Lifetime stats storage
export * from './persistence';

// Bot and session controller
export * from './controller';
