/**
 * Pile abstraction for Pyramid Ten.
 *
 * A Pile is a stack of cards (LIFO). It wraps a Card array and
 * exposes draw, put, remove, select and peek operations.
 *
 * Piles are used for the draw pile and the completed pile; the
 * discard pile extends this class.
 */

import type { Card, Rank, Suit } from './Card';
import { isExactly } from './Card';

/** Raised when a card is drawn from an empty pile. */
export class DrawEmptyError extends Error {
  constructor() {
    super('Attempted to draw a card from an empty pile');
    this.name = 'DrawEmptyError';
  }
}

export class Pile {
  protected readonly cards: Card[];

  /**
   * Create a Pile, optionally pre-populated with cards.
   * The last element of the array is treated as the top of the pile.
   */
  constructor(cards: Card[] = []) {
    this.cards = [...cards];
  }

  /** Put a card on top of the pile. */
  put(card: Card): void {
    this.cards.push(card);
  }

  /**
   * Remove and return the top card, turning it face-up.
   * @throws DrawEmptyError if the pile is empty.
   */
  draw(): Card {
    const card = this.cards.pop();
    if (card === undefined) {
      throw new DrawEmptyError();
    }
    card.isCovered = false;
    return card;
  }

  /**
   * Remove `card` if it is the exact instance on top of the pile.
   *
   * @returns Whether the card was removed. The pile is unchanged
   *          when it returns false, so callers can try several piles.
   */
  remove(card: Card): boolean {
    if (this.peek() !== card) return false;
    this.cards.pop();
    return true;
  }

  /**
   * Return the top card if it has the given suit and rank.
   * Never mutates the pile.
   */
  select(suit: Suit, rank: Rank): Card | undefined {
    const top = this.peek();
    return top !== undefined && isExactly(top, suit, rank) ? top : undefined;
  }

  /**
   * Remove the top `count` cards and return them bottom to top.
   * @throws If the pile holds fewer than `count` cards.
   */
  takeTop(count: number): Card[] {
    if (count < 0 || count > this.cards.length) {
      throw new Error(
        `Cannot take ${count} cards from a pile of ${this.cards.length}`,
      );
    }
    return this.cards.splice(this.cards.length - count, count);
  }

  /**
   * Look at the top card without removing it.
   * @returns The top card, or `undefined` if the pile is empty.
   */
  peek(): Card | undefined {
    return this.cards.length > 0
      ? this.cards[this.cards.length - 1]
      : undefined;
  }

  /** Whether the pile contains no cards. */
  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** The number of cards in the pile. */
  size(): number {
    return this.cards.length;
  }

  /**
   * Return a shallow copy of all cards in the pile (bottom to top).
   * Useful for inspection and serialization.
   */
  toArray(): Card[] {
    return [...this.cards];
  }
}
