/**
 * DiscardPile -- a Pile whose two topmost cards are both in play.
 *
 * The card directly beneath the top can be selected and removed as
 * well; removing it takes it out of position so the top stays on top.
 */

import type { Card, Rank, Suit } from './Card';
import { isExactly } from './Card';
import { Pile } from './Pile';

/** Which of the two playable discard positions a card occupies. */
export type DiscardSlot = 'top' | 'second';

export class DiscardPile extends Pile {
  /** Look at the card beneath the top without removing it. */
  peekSecond(): Card | undefined {
    return this.cards.length > 1
      ? this.cards[this.cards.length - 2]
      : undefined;
  }

  /**
   * Which playable slot holds this exact card instance, if any.
   */
  locate(card: Card): DiscardSlot | undefined {
    if (this.peek() === card) return 'top';
    if (this.peekSecond() === card) return 'second';
    return undefined;
  }

  /**
   * Remove `card` if it is the top or second-from-top instance.
   *
   * @returns Whether the card was removed.
   */
  override remove(card: Card): boolean {
    switch (this.locate(card)) {
      case 'top':
        this.cards.pop();
        return true;
      case 'second':
        this.cards.splice(this.cards.length - 2, 1);
        return true;
      default:
        return false;
    }
  }

  /**
   * Return the top card if it matches, otherwise the second-from-top
   * card if it matches. Never mutates the pile.
   */
  override select(suit: Suit, rank: Rank): Card | undefined {
    const top = super.select(suit, rank);
    if (top !== undefined) return top;

    const second = this.peekSecond();
    return second !== undefined && isExactly(second, suit, rank)
      ? second
      : undefined;
  }
}
