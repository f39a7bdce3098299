/**
 * Random.ts
 * Injectable random source for shuffling and bot decisions
 *
 * The engine and the bot never touch Math.random directly; they are handed an
 * Rng. A seeded Rng (mulberry32) makes a whole session replayable.
 */

import { randomInt } from 'crypto';

// ============================================================================
// Types
// ============================================================================

export interface Rng {
  /** Float in [0, 1) */
  next(): number;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_SEED = 0xffffffff;

// Offset used to derive independent streams from one session seed
const STREAM_OFFSET = 0x9e3779b9;

// ============================================================================
// Functions
// ============================================================================

/**
 * mulberry32: small, fast 32-bit generator with good enough distribution
 * for card games.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function generateRandomSeed(): number {
  return randomInt(0, MAX_SEED);
}

/**
 * Derive the seed of a secondary stream (e.g. the bot's) from a session seed
 */
export function deriveSeed(seed: number, stream: number): number {
  return (seed + Math.imul(stream, STREAM_OFFSET)) >>> 0;
}

/**
 * Integer in [min, max] inclusive
 */
export function randomIntBetween(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng.next() * (max - min + 1));
}

/**
 * Uniform float in [-magnitude, magnitude)
 */
export function randomNoise(rng: Rng, magnitude: number): number {
  return (rng.next() * 2 - 1) * magnitude;
}

/**
 * Fisher-Yates shuffle; returns a new array
 */
export function seededShuffle<T>(items: readonly T[], rng: Rng): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
