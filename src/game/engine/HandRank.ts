/**
 * HandRank.ts
 * Hand ranking values for Texas Hold'em
 *
 * A hand value is (category, tiebreak ranks). Values are totally ordered:
 * category first, then tiebreak ranks left to right.
 */

import { Card, Rank } from './Card';

// ============================================================================
// Types
// ============================================================================

/**
 * Hand category (0 = worst, 8 = best)
 */
export type HandCategory =
  | 0  // High Card
  | 1  // One Pair
  | 2  // Two Pair
  | 3  // Three of a Kind
  | 4  // Straight
  | 5  // Flush
  | 6  // Full House
  | 7  // Four of a Kind
  | 8; // Straight Flush

export const HandCategories = {
  HIGH_CARD: 0,
  ONE_PAIR: 1,
  TWO_PAIR: 2,
  THREE_OF_A_KIND: 3,
  STRAIGHT: 4,
  FLUSH: 5,
  FULL_HOUSE: 6,
  FOUR_OF_A_KIND: 7,
  STRAIGHT_FLUSH: 8,
} as const;

export interface HandValue {
  readonly category: HandCategory;
  /** Ranks relevant to the category, most significant first */
  readonly ranks: readonly Rank[];
}

export interface HandEvaluation {
  readonly value: HandValue;
  /** The five cards making the hand */
  readonly cards: readonly Card[];
  readonly description: string;
}

// ============================================================================
// Constants
// ============================================================================

export const HAND_CATEGORY_NAMES: Record<HandCategory, string> = {
  0: 'High Card',
  1: 'One Pair',
  2: 'Two Pair',
  3: 'Three of a Kind',
  4: 'Straight',
  5: 'Flush',
  6: 'Full House',
  7: 'Four of a Kind',
  8: 'Straight Flush',
};

const MAX_CATEGORY = 8;

// ============================================================================
// Functions
// ============================================================================

/**
 * Compare two hand values
 * Returns: negative if a < b, positive if a > b, 0 if equal
 */
export function compareHandValues(a: HandValue, b: HandValue): number {
  if (a.category !== b.category) {
    return a.category - b.category;
  }

  const length = Math.max(a.ranks.length, b.ranks.length);
  for (let i = 0; i < length; i++) {
    const aRank = a.ranks[i] ?? 0;
    const bRank = b.ranks[i] ?? 0;
    if (aRank !== bRank) {
      return aRank - bRank;
    }
  }

  return 0;
}

export function handValuesEqual(a: HandValue, b: HandValue): boolean {
  return compareHandValues(a, b) === 0;
}

/**
 * Normalized strength in [0, 1] used by the bot:
 * category / 8 plus up to 0.1 for the top rank.
 */
export function handStrength(value: HandValue): number {
  const top = value.ranks[0] ?? 2;
  const strength = value.category / MAX_CATEGORY + ((top - 2) / 12) * 0.1;
  return Math.min(strength, 1);
}
