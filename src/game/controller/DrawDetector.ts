/**
 * DrawDetector.ts
 * Drawing-hand detection for postflop decisions
 */

import { Card, SUITS } from '../engine/Card';

// ============================================================================
// Types
// ============================================================================

export interface DrawInfo {
  /** Exactly four of a suit, at least one in hand */
  readonly flushDraw: boolean;
  readonly openEnded: boolean;
  readonly gutshot: boolean;
  /** Hole cards above the highest board card */
  readonly overcards: number;
  /** Flop only */
  readonly backdoorFlush: boolean;
  /** Flop only */
  readonly backdoorStraight: boolean;
}

export const NO_DRAWS: DrawInfo = {
  flushDraw: false,
  openEnded: false,
  gutshot: false,
  overcards: 0,
  backdoorFlush: false,
  backdoorStraight: false,
};

const FLUSH_DRAW_OUTS = 9;
const OPEN_ENDED_OUTS = 8;
const GUTSHOT_OUTS = 4;
const OVERCARD_OUTS = 3;
const MAX_DRAW_EQUITY = 0.6;

// ============================================================================
// Detection
// ============================================================================

/**
 * Draws available with cards still to come. Empty preflop and on the river.
 */
export function detectDraws(holeCards: readonly Card[], board: readonly Card[]): DrawInfo {
  if (board.length < 3 || board.length >= 5) {
    return NO_DRAWS;
  }

  const flush = detectFlushDraws(holeCards, board);
  const straight = detectStraightDraws(holeCards, board);
  const topBoardRank = Math.max(...board.map(c => c.rank));

  return {
    ...flush,
    ...straight,
    overcards: holeCards.filter(c => c.rank > topBoardRank).length,
  };
}

function detectFlushDraws(
  holeCards: readonly Card[],
  board: readonly Card[]
): Pick<DrawInfo, 'flushDraw' | 'backdoorFlush'> {
  let flushDraw = false;
  let backdoorFlush = false;

  for (const suit of SUITS) {
    const inHand = holeCards.filter(c => c.suit === suit).length;
    if (inHand === 0) continue;
    const total = inHand + board.filter(c => c.suit === suit).length;
    if (total === 4) {
      flushDraw = true;
    } else if (total === 3 && board.length === 3) {
      backdoorFlush = true;
    }
  }

  return { flushDraw, backdoorFlush };
}

// Ace also plays low
function straightValues(cards: readonly Card[]): Set<number> {
  const values = new Set<number>();
  for (const card of cards) {
    values.add(card.rank);
    if (card.rank === 14) values.add(1);
  }
  return values;
}

function detectStraightDraws(
  holeCards: readonly Card[],
  board: readonly Card[]
): Pick<DrawInfo, 'openEnded' | 'gutshot' | 'backdoorStraight'> {
  const all = straightValues([...holeCards, ...board]);
  const inHand = straightValues(holeCards);
  let openEnded = false;
  let gutshot = false;
  let backdoorStraight = false;

  // Every five-rank window from A-5 to T-A
  for (let base = 1; base <= 10; base++) {
    const window = [base, base + 1, base + 2, base + 3, base + 4];
    const missing = window.filter(v => !all.has(v));
    const usesHand = window.some(v => inHand.has(v));
    if (!usesHand || missing.length === 0) continue;

    if (missing.length === 1) {
      const gap = missing[0];
      if (gap === base) {
        // Open at the top too?
        if (base + 5 <= 14) openEnded = true;
        else gutshot = true;
      } else if (gap === base + 4) {
        if (base >= 2) openEnded = true;
        else gutshot = true;
      } else {
        gutshot = true;
      }
    } else if (missing.length === 2 && board.length === 3) {
      backdoorStraight = true;
    }
  }

  return { openEnded, gutshot, backdoorStraight };
}

// ============================================================================
// Equity
// ============================================================================

export function countOuts(draws: DrawInfo): number {
  let outs = draws.overcards * OVERCARD_OUTS;
  if (draws.flushDraw) outs += FLUSH_DRAW_OUTS;
  if (draws.openEnded) outs += OPEN_ENDED_OUTS;
  else if (draws.gutshot) outs += GUTSHOT_OUTS;
  return outs;
}

/**
 * Rule of 4 and 2: outs x 4% with two cards to come, x 2% with one
 */
export function drawEquity(draws: DrawInfo, boardSize: number): number {
  const perOut = boardSize === 3 ? 0.04 : boardSize === 4 ? 0.02 : 0;
  return Math.min(countOuts(draws) * perOut, MAX_DRAW_EQUITY);
}

/**
 * Strength added to made-hand strength for draws, scaled by street
 * (1.0 on the flop, 0.5 on the turn)
 */
export function drawStrengthBoost(draws: DrawInfo, streetFactor: number): number {
  let boost = 0;
  if (draws.flushDraw) boost += 0.18;
  if (draws.openEnded) boost += 0.14;
  else if (draws.gutshot) boost += 0.08;
  boost += draws.overcards * 0.04;
  if (draws.backdoorFlush) boost += 0.03;
  if (draws.backdoorStraight) boost += 0.02;
  return boost * streetFactor;
}

export function hasStrongDraw(draws: DrawInfo): boolean {
  return draws.flushDraw || draws.openEnded;
}
