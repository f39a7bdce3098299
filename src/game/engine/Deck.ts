/**
 * Deck.ts
 * Standard 52-card deck with a draw cursor
 *
 * A deck is owned by the hand that uses it. Cards are drawn from the top;
 * the order is fixed once the deck is built.
 */

import { Card, SUITS, RANKS, createCard, cardToString, hasDuplicateCards } from './Card';
import { Rng, seededShuffle } from './Random';
import { EngineError, EngineErrorCode } from './EngineErrors';

// ============================================================================
// Functions
// ============================================================================

/**
 * Fresh 52-card deck in suit-major order (unshuffled)
 */
export function createOrderedCards(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(createCard(suit, rank));
    }
  }
  return cards;
}

// ============================================================================
// Deck
// ============================================================================

export class Deck {
  private readonly cards: readonly Card[];
  private cursor = 0;

  private constructor(cards: readonly Card[]) {
    this.cards = cards;
  }

  /**
   * Shuffled 52-card deck
   */
  static shuffled(rng: Rng): Deck {
    return new Deck(seededShuffle(createOrderedCards(), rng));
  }

  /**
   * Deck whose top cards are `top` in order, followed by the remaining cards
   * of a standard deck. Used to replay known deals.
   */
  static stacked(top: readonly Card[]): Deck {
    if (hasDuplicateCards(top)) {
      throw new EngineError(
        EngineErrorCode.INVALID_DECK,
        'Stacked deck contains duplicate cards',
        { cards: top.map(cardToString) }
      );
    }
    const used = new Set(top.map(cardToString));
    const rest = createOrderedCards().filter(card => !used.has(cardToString(card)));
    return new Deck([...top, ...rest]);
  }

  get remaining(): number {
    return this.cards.length - this.cursor;
  }

  draw(): Card {
    const card = this.cards[this.cursor];
    if (card === undefined) {
      throw new EngineError(EngineErrorCode.DECK_EXHAUSTED, 'Cannot draw from an empty deck');
    }
    this.cursor++;
    return card;
  }

  drawMany(count: number): Card[] {
    if (count > this.remaining) {
      throw new EngineError(
        EngineErrorCode.DECK_EXHAUSTED,
        `Cannot deal ${count} cards, only ${this.remaining} remaining`,
        { requested: count, remaining: this.remaining }
      );
    }
    const cards: Card[] = [];
    for (let i = 0; i < count; i++) {
      cards.push(this.draw());
    }
    return cards;
  }
}
