/**
 * PreflopStrength.ts
 * Starting-hand strength from the heads-up tier table
 *
 * The 13x13 table lives in data/preflop-tiers.json. Pairs sit on the
 * diagonal, suited hands above it, offsuit hands below it.
 */

import { Card, Rank, RANK_NAMES } from '../engine/Card';
import preflopTable from './data/preflop-tiers.json';

// ============================================================================
// Types
// ============================================================================

export type PreflopTier = 'premium' | 'strong' | 'playable' | 'marginal' | 'trash';

type TierCode = 'P' | 'S' | 'L' | 'M' | 'T';

// ============================================================================
// Table
// ============================================================================

const TIER_BY_CODE: Record<TierCode, PreflopTier> = {
  P: 'premium',
  S: 'strong',
  L: 'playable',
  M: 'marginal',
  T: 'trash',
};

export const TIER_STRENGTH: Record<PreflopTier, number> = {
  premium: preflopTable.tierStrength.P,
  strong: preflopTable.tierStrength.S,
  playable: preflopTable.tierStrength.L,
  marginal: preflopTable.tierStrength.M,
  trash: preflopTable.tierStrength.T,
};

function isTierCode(value: string): value is TierCode {
  return value === 'P' || value === 'S' || value === 'L' || value === 'M' || value === 'T';
}

function parseGrid(grid: readonly string[]): PreflopTier[][] {
  if (grid.length !== 13) {
    throw new Error(`Preflop table must have 13 rows, found ${grid.length}`);
  }
  return grid.map((row, index) => {
    if (row.length !== 13) {
      throw new Error(`Preflop table row ${index} must have 13 cells, found ${row.length}`);
    }
    return Array.from(row, code => {
      if (!isTierCode(code)) {
        throw new Error(`Unknown preflop tier code "${code}" in row ${index}`);
      }
      return TIER_BY_CODE[code];
    });
  });
}

const TIER_GRID = parseGrid(preflopTable.grid);

// Row/column 0 is the Ace
function gridIndex(rank: Rank): number {
  return 14 - rank;
}

// ============================================================================
// Functions
// ============================================================================

export function classifyPreflop(holeCards: readonly Card[]): PreflopTier {
  const [first, second] = requireTwoCards(holeCards);
  const high = first.rank >= second.rank ? first : second;
  const low = high === first ? second : first;

  if (high.rank === low.rank) {
    return TIER_GRID[gridIndex(high.rank)][gridIndex(high.rank)];
  }
  if (high.suit === low.suit) {
    return TIER_GRID[gridIndex(high.rank)][gridIndex(low.rank)];
  }
  return TIER_GRID[gridIndex(low.rank)][gridIndex(high.rank)];
}

/**
 * Tier strength plus a small kicker bonus, capped at 1
 */
export function preflopStrength(holeCards: readonly Card[]): number {
  const [first, second] = requireTwoCards(holeCards);
  const high = Math.max(first.rank, second.rank);
  const low = Math.min(first.rank, second.rank);
  const kicker = ((high - 2) / 12) * 0.04 + ((low - 2) / 12) * 0.01;
  return Math.min(TIER_STRENGTH[classifyPreflop(holeCards)] + kicker, 1);
}

/**
 * Conventional shorthand: "AA", "AKs", "T9o"
 */
export function handNotation(holeCards: readonly Card[]): string {
  const [first, second] = requireTwoCards(holeCards);
  const high = first.rank >= second.rank ? first : second;
  const low = high === first ? second : first;
  if (high.rank === low.rank) {
    return `${RANK_NAMES[high.rank]}${RANK_NAMES[low.rank]}`;
  }
  return `${RANK_NAMES[high.rank]}${RANK_NAMES[low.rank]}${high.suit === low.suit ? 's' : 'o'}`;
}

function requireTwoCards(holeCards: readonly Card[]): [Card, Card] {
  if (holeCards.length !== 2) {
    throw new Error(`Expected 2 hole cards, got ${holeCards.length}`);
  }
  return [holeCards[0], holeCards[1]];
}
