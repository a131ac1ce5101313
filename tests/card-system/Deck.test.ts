import { describe, it, expect } from 'vitest';
import {
  DECK_SIZE,
  createDeckFrom,
  createSeededRng,
  createTenRankDeck,
  shuffle,
} from '../../src/card-system/Deck';

const keyOf = (c: { rank: number; suit: string }): string => `${c.rank}-${c.suit}`;

describe('Deck', () => {
  describe('createTenRankDeck', () => {
    it('should create a deck of 40 cards', () => {
      expect(DECK_SIZE).toBe(40);
      expect(createTenRankDeck()).toHaveLength(40);
    });

    it('should contain no duplicate cards', () => {
      const keys = new Set(createTenRankDeck().map(keyOf));
      expect(keys.size).toBe(40);
    });

    it('should have all cards covered', () => {
      expect(createTenRankDeck().every((c) => c.isCovered)).toBe(true);
    });

    it('should order cards by suit then rank', () => {
      const deck = createTenRankDeck();
      expect(keyOf(deck[0])).toBe('1-clubs');
      expect(keyOf(deck[9])).toBe('10-clubs');
      expect(keyOf(deck[10])).toBe('1-diamonds');
      expect(keyOf(deck[39])).toBe('10-spades');
    });
  });

  describe('createDeckFrom', () => {
    it('should create cards covered unless stated otherwise', () => {
      const deck = createDeckFrom([
        { rank: 1, suit: 'spades' },
        { rank: 10, suit: 'hearts', isCovered: false },
      ]);
      expect(deck).toHaveLength(2);
      expect(deck[0].isCovered).toBe(true);
      expect(deck[1].rank).toBe(10);
      expect(deck[1].isCovered).toBe(false);
    });
  });

  describe('shuffle', () => {
    it('should return the same array with the same cards', () => {
      const deck = createTenRankDeck();
      const before = deck.map(keyOf).sort();
      const result = shuffle(deck, createSeededRng(7));
      expect(result).toBe(deck);
      expect(result.map(keyOf).sort()).toEqual(before);
    });

    it('should change the order of cards', () => {
      const original = createTenRankDeck().map(keyOf);
      const shuffled = shuffle(createTenRankDeck(), createSeededRng(42)).map(keyOf);
      expect(shuffled).not.toEqual(original);
    });

    it('should be deterministic for a given seed', () => {
      const a = shuffle(createTenRankDeck(), createSeededRng(123)).map(keyOf);
      const b = shuffle(createTenRankDeck(), createSeededRng(123)).map(keyOf);
      expect(a).toEqual(b);
    });

    it('should leave the order alone when the rng always picks the last index', () => {
      const deck = createTenRankDeck();
      const original = deck.map(keyOf);
      shuffle(deck, () => 0.999999);
      expect(deck.map(keyOf)).toEqual(original);
    });
  });

  describe('createSeededRng', () => {
    it('should produce values in [0, 1)', () => {
      const rng = createSeededRng(99);
      for (let i = 0; i < 100; i++) {
        const value = rng();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should stay in [0, 1) for a negative seed', () => {
      const rng = createSeededRng(-1000);
      for (let i = 0; i < 100; i++) {
        const value = rng();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should wrap a negative seed to its unsigned 32-bit value', () => {
      const a = createSeededRng(-1);
      const b = createSeededRng(4294967295);
      expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    });

    it('should shuffle a full deck with a negative seed', () => {
      const shuffled = shuffle(createTenRankDeck(), createSeededRng(-1000));
      expect(new Set(shuffled.map(keyOf)).size).toBe(40);
    });

    it('should step a linear congruential sequence', () => {
      const rng = createSeededRng(0);
      expect(rng()).toBe(1013904223 / 4294967296);
    });
  });
});
