/**
 * Game Engine
 *
 * Heads-up No-Limit Hold'em rules: cards, hand evaluation, betting and
 * hand orchestration.
 */

// Card primitives
export * from './Card';
export * from './Deck';
export * from './Random';

// Hand evaluation
export * from './HandRank';
export * from './HandEvaluator';

// Game state
export * from './TableState';
export * from './BettingRound';
export * from './PlayerView';

// Events and errors
export * from './GameEvents';
export * from './EngineErrors';

// Orchestration
export * from './GameLoop';
