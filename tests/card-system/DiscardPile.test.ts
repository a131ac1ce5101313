import { describe, it, expect } from 'vitest';
import { DiscardPile } from '../../src/card-system/DiscardPile';
import { createCard } from '../../src/card-system/Card';
import type { Card } from '../../src/card-system/Card';

function threeCardPile(): { pile: DiscardPile; bottom: Card; second: Card; top: Card } {
  const bottom = createCard(2, 'clubs', false);
  const second = createCard(4, 'hearts', false);
  const top = createCard(6, 'spades', false);
  return { pile: new DiscardPile([bottom, second, top]), bottom, second, top };
}

describe('DiscardPile', () => {
  it('should expose the card beneath the top', () => {
    const { pile, second } = threeCardPile();
    expect(pile.peekSecond()).toBe(second);
    expect(new DiscardPile([createCard(1, 'clubs')]).peekSecond()).toBeUndefined();
  });

  it('should locate the two playable positions', () => {
    const { pile, bottom, second, top } = threeCardPile();
    expect(pile.locate(top)).toBe('top');
    expect(pile.locate(second)).toBe('second');
    expect(pile.locate(bottom)).toBeUndefined();
  });

  describe('select', () => {
    it('should check the top first, then the second card', () => {
      const { pile, second, top } = threeCardPile();
      expect(pile.select('spades', 6)).toBe(top);
      expect(pile.select('hearts', 4)).toBe(second);
    });

    it('should not reach the third card', () => {
      const { pile } = threeCardPile();
      expect(pile.select('clubs', 2)).toBeUndefined();
    });

    it('should return undefined on an empty pile', () => {
      expect(new DiscardPile().select('clubs', 2)).toBeUndefined();
    });
  });

  describe('remove', () => {
    it('should pop the top card', () => {
      const { pile, bottom, second, top } = threeCardPile();
      expect(pile.remove(top)).toBe(true);
      expect(pile.toArray()).toEqual([bottom, second]);
    });

    it('should take the second card out of position, keeping the top on top', () => {
      const { pile, bottom, second, top } = threeCardPile();
      expect(pile.remove(second)).toBe(true);
      expect(pile.toArray()).toEqual([bottom, top]);
      expect(pile.peek()).toBe(top);
    });

    it('should refuse deeper cards and strangers', () => {
      const { pile, bottom } = threeCardPile();
      expect(pile.remove(bottom)).toBe(false);
      expect(pile.remove(createCard(6, 'spades'))).toBe(false);
      expect(pile.size()).toBe(3);
    });

    it('should return false on an empty pile', () => {
      expect(new DiscardPile().remove(createCard(1, 'clubs'))).toBe(false);
    });
  });
});
