/**
 * Card System Module
 *
 * Cards, the 40-card deck, shuffling, and the piles cards move
 * between during play.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and factory
export type { Card } from './Card';
export type { Rank, Suit } from './Card';
export {
  RANKS,
  SUITS,
  SUIT_SYMBOLS,
  PAIR_TOTAL,
  InvalidRankError,
  isRank,
  toRank,
  createCard,
  canPair,
  isExactly,
  rankSymbol,
  rankName,
  cardName,
} from './Card';

// Deck factory and operations
export {
  DECK_SIZE,
  createTenRankDeck,
  createDeckFrom,
  shuffle,
  createSeededRng,
} from './Deck';

// Pile abstractions
export { Pile, DrawEmptyError } from './Pile';
export type { DiscardSlot } from './DiscardPile';
export { DiscardPile } from './DiscardPile';
