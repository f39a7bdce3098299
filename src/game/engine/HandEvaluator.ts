/**
 * HandEvaluator.ts
 * Best 5-card hand from 5, 6 or 7 cards
 *
 * Brute force over every 5-card combination (at most 21). Pure: equal inputs
 * give equal values regardless of card order.
 */

import { Card, Rank, Suit, RANK_WORDS, cardToString, hasDuplicateCards } from './Card';
import {
  HandCategory,
  HandCategories,
  HandEvaluation,
  HandValue,
  HAND_CATEGORY_NAMES,
  compareHandValues,
} from './HandRank';

// ============================================================================
// Errors
// ============================================================================

export class HandEvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandEvaluationError';
    Object.setPrototypeOf(this, HandEvaluationError.prototype);
  }
}

// ============================================================================
// Internal Helpers
// ============================================================================

/**
 * Generate all k-combinations of an array
 */
function combinations<T>(arr: readonly T[], k: number): T[][] {
  if (k === 0) return [[]];
  if (arr.length < k) return [];

  const result: T[][] = [];
  const first = arr[0];
  const rest = arr.slice(1);

  for (const combo of combinations(rest, k - 1)) {
    result.push([first, ...combo]);
  }
  for (const combo of combinations(rest, k)) {
    result.push(combo);
  }

  return result;
}

function isFlush(cards: readonly Card[]): boolean {
  const suit: Suit = cards[0].suit;
  return cards.every(c => c.suit === suit);
}

/**
 * High card of a 5-card straight, or null.
 * The wheel (A-2-3-4-5) is 5-high.
 */
function getStraightHighCard(cards: readonly Card[]): Rank | null {
  const ranks = Array.from(new Set(cards.map(c => c.rank))).sort((a, b) => a - b);
  if (ranks.length !== 5) return null;

  if (ranks[4] - ranks[0] === 4) {
    return ranks[4];
  }
  if (ranks[0] === 2 && ranks[1] === 3 && ranks[2] === 4 && ranks[3] === 5 && ranks[4] === 14) {
    return 5;
  }
  return null;
}

/**
 * Rank groups sorted by count desc, then rank desc
 */
function getRankGroups(cards: readonly Card[]): Array<[Rank, number]> {
  const counts = new Map<Rank, number>();
  for (const card of cards) {
    counts.set(card.rank, (counts.get(card.rank) ?? 0) + 1);
  }
  return Array.from(counts.entries()).sort((a, b) => {
    if (b[1] !== a[1]) return b[1] - a[1];
    return b[0] - a[0];
  });
}

function value(category: HandCategory, ranks: readonly Rank[]): HandValue {
  return { category, ranks };
}

// ============================================================================
// 5-Card Hand Evaluation
// ============================================================================

function evaluateFiveCards(cards: readonly Card[]): HandValue {
  const flush = isFlush(cards);
  const straightHigh = getStraightHighCard(cards);
  const groups = getRankGroups(cards);
  const counts = groups.map(g => g[1]);
  const ranks = groups.map(g => g[0]);

  if (flush && straightHigh !== null) {
    return value(HandCategories.STRAIGHT_FLUSH, [straightHigh]);
  }
  if (counts[0] === 4) {
    return value(HandCategories.FOUR_OF_A_KIND, [ranks[0], ranks[1]]);
  }
  if (counts[0] === 3 && counts[1] === 2) {
    return value(HandCategories.FULL_HOUSE, [ranks[0], ranks[1]]);
  }
  if (flush) {
    return value(HandCategories.FLUSH, ranks);
  }
  if (straightHigh !== null) {
    return value(HandCategories.STRAIGHT, [straightHigh]);
  }
  if (counts[0] === 3) {
    return value(HandCategories.THREE_OF_A_KIND, ranks);
  }
  if (counts[0] === 2 && counts[1] === 2) {
    // Groups are already ordered high pair, low pair, kicker
    return value(HandCategories.TWO_PAIR, ranks);
  }
  if (counts[0] === 2) {
    return value(HandCategories.ONE_PAIR, ranks);
  }
  return value(HandCategories.HIGH_CARD, ranks);
}

// ============================================================================
// Description
// ============================================================================

function plural(rank: Rank): string {
  return rank === 6 ? 'Sixes' : `${RANK_WORDS[rank]}s`;
}

/**
 * Human-readable description, e.g. "Full House, Aces over Kings"
 */
export function describeHand(hand: HandValue): string {
  const [first, second] = hand.ranks;
  switch (hand.category) {
    case HandCategories.STRAIGHT_FLUSH:
      return first === 14 ? 'Royal Flush' : `Straight Flush, ${RANK_WORDS[first]} high`;
    case HandCategories.FOUR_OF_A_KIND:
      return `Four of a Kind, ${plural(first)}`;
    case HandCategories.FULL_HOUSE:
      return `Full House, ${plural(first)} over ${plural(second)}`;
    case HandCategories.FLUSH:
      return `Flush, ${RANK_WORDS[first]} high`;
    case HandCategories.STRAIGHT:
      return `Straight, ${RANK_WORDS[first]} high`;
    case HandCategories.THREE_OF_A_KIND:
      return `Three of a Kind, ${plural(first)}`;
    case HandCategories.TWO_PAIR:
      return `Two Pair, ${plural(first)} and ${plural(second)}`;
    case HandCategories.ONE_PAIR:
      return `Pair of ${plural(first)}`;
    case HandCategories.HIGH_CARD:
      return `${HAND_CATEGORY_NAMES[hand.category]}, ${RANK_WORDS[first]}`;
  }
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Evaluate the best 5-card hand from 5 to 7 cards
 *
 * @throws HandEvaluationError on a card count outside 5..7 or duplicate cards
 */
export function evaluateHand(cards: readonly Card[]): HandEvaluation {
  if (cards.length < 5 || cards.length > 7) {
    throw new HandEvaluationError(`Need 5 to 7 cards, got ${cards.length}`);
  }
  if (hasDuplicateCards(cards)) {
    throw new HandEvaluationError(
      `Duplicate cards in hand: ${cards.map(cardToString).join(' ')}`
    );
  }

  let bestCards: readonly Card[] = cards.slice(0, 5);
  let best = evaluateFiveCards(bestCards);

  for (const combo of combinations(cards, 5)) {
    const candidate = evaluateFiveCards(combo);
    if (compareHandValues(candidate, best) > 0) {
      best = candidate;
      bestCards = combo;
    }
  }

  return { value: best, cards: bestCards, description: describeHand(best) };
}

/**
 * Evaluate hole cards together with the board
 */
export function evaluateHoldem(
  holeCards: readonly Card[],
  board: readonly Card[]
): HandEvaluation {
  return evaluateHand([...holeCards, ...board]);
}

/**
 * Compare two card sets directly
 * Returns: negative if a < b, positive if a > b, 0 if equal
 */
export function compareHands(a: readonly Card[], b: readonly Card[]): number {
  return compareHandValues(evaluateHand(a).value, evaluateHand(b).value);
}
