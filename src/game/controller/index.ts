/**
 * Game Controller
 *
 * Rule-based bot, hand history and the session controller that runs a
 * human-vs-bot session.
 */

// Bot decision engine
export * from './PreflopStrength';
export * from './DrawDetector';
export * from './BoardTexture';
export * from './BotProfiles';
export * from './RuleBasedBot';

// Session
export * from './HandHistory';
export * from './SessionSnapshot';
export * from './GameController';
