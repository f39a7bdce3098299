/**
 * BoardTexture.ts
 * Community card texture analysis
 *
 * Wetness is a small integer score: suit concentration, connected rank
 * pairs and a paired board each add to it. The category drives bet sizing.
 */

import { Card, SUITS } from '../engine/Card';

// ============================================================================
// Types
// ============================================================================

export type TextureCategory = 'dry' | 'medium' | 'wet';

export interface BoardTexture {
  readonly wetness: number;
  readonly paired: boolean;
  /** Every board card shares one suit */
  readonly monotone: boolean;
  /** Three or more board cards share a suit */
  readonly flushPossible: boolean;
  /** Three distinct ranks fit in one five-rank window */
  readonly straightPossible: boolean;
  readonly highCard: number;
  readonly category: TextureCategory;
}

const EMPTY_TEXTURE: BoardTexture = {
  wetness: 0,
  paired: false,
  monotone: false,
  flushPossible: false,
  straightPossible: false,
  highCard: 0,
  category: 'dry',
};

// ============================================================================
// Analysis
// ============================================================================

export function analyzeBoardTexture(board: readonly Card[]): BoardTexture {
  if (board.length === 0) {
    return EMPTY_TEXTURE;
  }

  const maxSuitCount = Math.max(...SUITS.map(suit => board.filter(c => c.suit === suit).length));
  const ranks = board.map(c => c.rank).sort((a, b) => a - b);
  const uniqueRanks = [...new Set(ranks)];
  const paired = uniqueRanks.length < ranks.length;

  let wetness = 0;
  if (maxSuitCount >= 3) wetness += 2;
  else if (maxSuitCount === 2) wetness += 1;

  for (let i = 1; i < ranks.length; i++) {
    if (ranks[i] - ranks[i - 1] <= 2) wetness += 1;
  }
  if (paired) wetness += 1;

  return {
    wetness,
    paired,
    monotone: board.length >= 3 && maxSuitCount === board.length,
    flushPossible: maxSuitCount >= 3,
    straightPossible: hasThreeInWindow(uniqueRanks),
    highCard: ranks[ranks.length - 1],
    category: categorizeWetness(wetness),
  };
}

function hasThreeInWindow(uniqueRanks: readonly number[]): boolean {
  const values = uniqueRanks.includes(14) ? [1, ...uniqueRanks] : [...uniqueRanks];
  for (let low = 1; low <= 10; low++) {
    const inWindow = values.filter(v => v >= low && v <= low + 4).length;
    if (inWindow >= 3) return true;
  }
  return false;
}

function categorizeWetness(wetness: number): TextureCategory {
  if (wetness <= 1) return 'dry';
  if (wetness <= 3) return 'medium';
  return 'wet';
}
