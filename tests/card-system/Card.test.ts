import { describe, it, expect } from 'vitest';
import {
  InvalidRankError,
  RANKS,
  SUITS,
  canPair,
  cardName,
  createCard,
  isExactly,
  isRank,
  rankName,
  rankSymbol,
  toRank,
} from '../../src/card-system/Card';

describe('Card', () => {
  it('should create a covered card by default', () => {
    const card = createCard(1, 'spades');
    expect(card.rank).toBe(1);
    expect(card.suit).toBe('spades');
    expect(card.isCovered).toBe(true);
  });

  it('should create an uncovered card when specified', () => {
    const card = createCard(10, 'hearts', false);
    expect(card.isCovered).toBe(false);
  });

  it('should allow toggling isCovered', () => {
    const card = createCard(5, 'diamonds');
    card.isCovered = false;
    expect(card.isCovered).toBe(false);
  });

  it('should export the 10 ranks and 4 suits', () => {
    expect(RANKS).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(SUITS).toEqual(['clubs', 'diamonds', 'hearts', 'spades']);
  });

  describe('toRank', () => {
    it('should accept integers from 1 to 10', () => {
      expect(toRank(1)).toBe(1);
      expect(toRank(10)).toBe(10);
    });

    it('should reject numbers outside 1..10', () => {
      expect(() => toRank(0)).toThrow(InvalidRankError);
      expect(() => toRank(11)).toThrow(
        'A rank must be between 1 and 10, got 11 instead',
      );
    });

    it('should reject non-integers', () => {
      expect(isRank(2.5)).toBe(false);
      expect(() => toRank(2.5)).toThrow(InvalidRankError);
    });
  });

  describe('canPair', () => {
    it('should pair cards whose ranks add up to 10', () => {
      expect(canPair(createCard(3, 'clubs'), createCard(7, 'hearts'))).toBe(true);
      expect(canPair(createCard(5, 'hearts'), createCard(5, 'spades'))).toBe(true);
      expect(canPair(createCard(1, 'clubs'), createCard(9, 'diamonds'))).toBe(true);
    });

    it('should not pair other sums', () => {
      expect(canPair(createCard(10, 'clubs'), createCard(1, 'hearts'))).toBe(false);
      expect(canPair(createCard(4, 'clubs'), createCard(4, 'hearts'))).toBe(false);
    });
  });

  it('should compare suit and rank without identity in isExactly', () => {
    const card = createCard(9, 'hearts');
    expect(isExactly(card, 'hearts', 9)).toBe(true);
    expect(isExactly(card, 'spades', 9)).toBe(false);
    expect(isExactly(card, 'hearts', 1)).toBe(false);
  });

  describe('display names', () => {
    it('should use letters for the face ranks', () => {
      expect(RANKS.map(rankSymbol)).toEqual([
        'A', '2', '3', '4', '5', '6', '7', 'J', 'Q', 'K',
      ]);
      expect(rankName(1)).toBe('Ace');
      expect(rankName(8)).toBe('Jack');
      expect(rankName(9)).toBe('Queen');
      expect(rankName(10)).toBe('King');
      expect(rankName(4)).toBe('4');
    });

    it('should name a card by rank and capitalised suit', () => {
      expect(cardName(createCard(9, 'hearts'))).toBe('Queen of Hearts');
      expect(cardName({ rank: 6, suit: 'clubs' })).toBe('6 of Clubs');
    });
  });
});
