/**
 * Card.ts
 * Card value type for heads-up Hold'em
 *
 * Cards are plain immutable records. Text notation is rank char + suit char
 * ("As", "Td", "7c"); display notation uses suit symbols ("A♠").
 */

// ============================================================================
// Types
// ============================================================================

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
// 11 = Jack, 12 = Queen, 13 = King, 14 = Ace

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

// ============================================================================
// Constants
// ============================================================================

export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const RANK_NAMES: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: 'T',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export const RANK_WORDS: Record<Rank, string> = {
  2: 'Two',
  3: 'Three',
  4: 'Four',
  5: 'Five',
  6: 'Six',
  7: 'Seven',
  8: 'Eight',
  9: 'Nine',
  10: 'Ten',
  11: 'Jack',
  12: 'Queen',
  13: 'King',
  14: 'Ace',
};

export const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

const SUIT_CHARS: Record<Suit, string> = {
  clubs: 'c',
  diamonds: 'd',
  hearts: 'h',
  spades: 's',
};

const RANK_BY_CHAR: Readonly<Record<string, Rank>> = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  T: 10,
  '10': 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

const SUIT_BY_CHAR: Readonly<Record<string, Suit>> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
};

// ============================================================================
// Functions
// ============================================================================

export function createCard(suit: Suit, rank: Rank): Card {
  return { suit, rank };
}

/**
 * Format card for display (e.g., "A♠", "K♥")
 */
export function formatCard(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_SYMBOLS[card.suit]}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}

/**
 * Two-character notation (e.g., "As", "Td"); inverse of parseCard
 */
export function cardToString(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_CHARS[card.suit]}`;
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank;
}

/**
 * Stable 0..51 index, suit-major
 */
export function cardIndex(card: Card): number {
  return SUITS.indexOf(card.suit) * 13 + (card.rank - 2);
}

/**
 * Parse card from string notation (e.g., "As", "Kh", "2c", "10d")
 */
export function parseCard(notation: string): Card | null {
  const trimmed = notation.trim();
  if (trimmed.length < 2) return null;

  const rank = RANK_BY_CHAR[trimmed.slice(0, -1).toUpperCase()];
  const suit = SUIT_BY_CHAR[trimmed.slice(-1).toLowerCase()];
  if (rank === undefined || suit === undefined) return null;

  return createCard(suit, rank);
}

/**
 * Parse a whitespace-separated card list ("As Kd 7c").
 * Throws on any unparseable token.
 */
export function parseCards(notation: string): Card[] {
  return notation
    .split(/\s+/)
    .filter(token => token.length > 0)
    .map(token => {
      const card = parseCard(token);
      if (!card) {
        throw new Error(`Invalid card notation: "${token}"`);
      }
      return card;
    });
}

export function hasDuplicateCards(cards: readonly Card[]): boolean {
  const seen = new Set<number>();
  for (const card of cards) {
    const index = cardIndex(card);
    if (seen.has(index)) return true;
    seen.add(index);
  }
  return false;
}
