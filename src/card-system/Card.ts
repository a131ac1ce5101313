/**
 * Card types and factory functions for Pyramid Ten.
 *
 * Defines Rank, Suit, and Card as the foundational data model
 * consumed by the piles, the tableau and the game engine.
 */

/**
 * Card ranks. 1 is the Ace; 8, 9 and 10 are shown as Jack, Queen and
 * King but keep their numeric value when pairing.
 */
export type Rank = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10;

/** All ranks in order (Ace low). */
export const RANKS: readonly Rank[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10] as const;

/** Card suits. */
export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';

/** All suits in alphabetical order. */
export const SUITS: readonly Suit[] = [
  'clubs',
  'diamonds',
  'hearts',
  'spades',
] as const;

/** Glyph drawn on the face of a card for each suit. */
export const SUIT_SYMBOLS: Readonly<Record<Suit, string>> = {
  clubs: '♧',
  diamonds: '♢',
  hearts: '♡',
  spades: '♤',
};

/** The sum a pair of cards must reach to be removed. */
export const PAIR_TOTAL = 10;

const FACE_SYMBOLS: Readonly<Partial<Record<Rank, string>>> = {
  1: 'A',
  8: 'J',
  9: 'Q',
  10: 'K',
};

const FACE_NAMES: Readonly<Partial<Record<Rank, string>>> = {
  1: 'Ace',
  8: 'Jack',
  9: 'Queen',
  10: 'King',
};

/**
 * A playing card with rank, suit, and covered state.
 *
 * Cards are mutable only in their `isCovered` property; rank and suit
 * are fixed at creation and identify the card across the whole deck.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
  isCovered: boolean;
}

/** Raised when a number cannot be used as a rank. */
export class InvalidRankError extends Error {
  constructor(readonly value: number) {
    super(`A rank must be between 1 and 10, got ${value} instead`);
    this.name = 'InvalidRankError';
  }
}

/** Whether a number is a valid rank. */
export function isRank(value: number): value is Rank {
  return Number.isInteger(value) && value >= 1 && value <= 10;
}

/**
 * Convert a number to a Rank.
 * @throws InvalidRankError if the number is not an integer in [1, 10].
 */
export function toRank(value: number): Rank {
  if (!isRank(value)) {
    throw new InvalidRankError(value);
  }
  return value;
}

/**
 * Create a single card, covered by default.
 * @throws InvalidRankError if the rank is out of range.
 */
export function createCard(
  rank: Rank,
  suit: Suit,
  isCovered: boolean = true,
): Card {
  return { rank: toRank(rank), suit, isCovered };
}

/** Whether two cards add up to ten. */
export function canPair(first: Card, second: Card): boolean {
  return first.rank + second.rank === PAIR_TOTAL;
}

/** Whether a card has the given suit and rank, regardless of instance. */
export function isExactly(card: Card, suit: Suit, rank: Rank): boolean {
  return card.suit === suit && card.rank === rank;
}

/** Short rank label drawn on a card face (`A`, `2`..`7`, `J`, `Q`, `K`). */
export function rankSymbol(rank: Rank): string {
  return FACE_SYMBOLS[rank] ?? String(rank);
}

/** Spoken rank name (`Ace`, `2`..`7`, `Jack`, `Queen`, `King`). */
export function rankName(rank: Rank): string {
  return FACE_NAMES[rank] ?? String(rank);
}

/** Human-readable card name, e.g. `"Queen of Hearts"`. */
export function cardName(card: Pick<Card, 'rank' | 'suit'>): string {
  const suit = card.suit.charAt(0).toUpperCase() + card.suit.slice(1);
  return `${rankName(card.rank)} of ${suit}`;
}
