/**
 * Config Module Exports
 */

export * from './ConfigErrors';
export * from './GameConfig';
