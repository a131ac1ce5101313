/**
 * Deck operations for Pyramid Ten.
 *
 * A Deck is represented as a plain Card array. This module provides
 * factory functions and shuffling that work on Card arrays; the
 * Pile class wraps a deck once it is in play.
 */

import type { Card, Rank, Suit } from './Card';
import { RANKS, SUITS, createCard } from './Card';

/** Number of cards in a full deck (4 suits x 10 ranks). */
export const DECK_SIZE = SUITS.length * RANKS.length;

/**
 * Create the 40-card deck (Ace through King in each suit), all
 * cards covered.
 *
 * Cards are ordered by suit (alphabetical) then rank (Ace first).
 */
export function createTenRankDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Create a deck from a specific list of rank/suit pairs.
 * All cards are created covered unless stated otherwise.
 */
export function createDeckFrom(
  cards: ReadonlyArray<{ rank: Rank; suit: Suit; isCovered?: boolean }>,
): Card[] {
  return cards.map((c) => createCard(c.rank, c.suit, c.isCovered ?? true));
}

/**
 * Shuffle a deck in place using the Fisher-Yates algorithm.
 *
 * An optional random number generator can be supplied for
 * deterministic testing. The generator must return a value
 * in [0, 1) (same contract as Math.random).
 *
 * @returns The same array reference (mutated).
 */
export function shuffle(
  deck: Card[],
  rng: () => number = Math.random,
): Card[] {
  for (let i = deck.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [deck[i], deck[j]] = [deck[j], deck[i]];
  }
  return deck;
}

/**
 * Create a deterministic RNG from a numeric seed.
 * Uses a linear congruential generator compatible with the
 * shuffle() function's () => number contract. Any integer seed works;
 * negative and oversized seeds wrap to an unsigned 32-bit state.
 */
export function createSeededRng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}
