/**
 * Shared fixtures for the Pyramid Ten tests.
 */

import { createCard } from '../../src/card-system/Card';
import type { Card } from '../../src/card-system/Card';
import { createTenRankDeck } from '../../src/card-system/Deck';
import { DiscardPile } from '../../src/card-system/DiscardPile';
import { Pile } from '../../src/card-system/Pile';
import { parseSpecifier } from '../../games/pyramid-ten/ActionParser';
import type { PyramidTenBoard } from '../../games/pyramid-ten/PyramidTenState';
import { Tableau } from '../../games/pyramid-ten/Tableau';

/** Create a covered card from a specifier such as `kh` or `5s`. */
export function card(spec: string): Card {
  const { rank, suit } = parseSpecifier(spec);
  return createCard(rank, suit);
}

/** Create several covered cards from specifiers. */
export function cards(...specs: string[]): Card[] {
  return specs.map(card);
}

const keyOf = (c: Pick<Card, 'rank' | 'suit'>): string => `${c.suit}:${c.rank}`;

/**
 * Build a full 40-card deck, last element on top, that deals `tableau`
 * (row-major, terminal row last) and leaves `drawTop` on top of the
 * draw pile (its last element drawn first). Every other card lies
 * below them in suit-major order.
 */
export function arrangeDeck(
  tableau: readonly string[],
  drawTop: readonly string[] = [],
): Card[] {
  const named = [...drawTop, ...tableau].map(card);
  const taken = new Set(named.map(keyOf));
  const rest = createTenRankDeck().filter((c) => !taken.has(keyOf(c)));
  return [...rest, ...named];
}

/** A rows=2 tableau that clears with `6d 4d`, `3c 7c`, then `kh`. */
export const WINNABLE_TWO_ROWS = ['kh', '3c', '7c', '6d', '4d'] as const;

/**
 * A two-row tableau (kh / 3c 7c / terminal 6d 4d, only 6d and 4d
 * exposed) beside the given discard pile and draw pile, tops last.
 */
export function makeBoard(discard: string[], draw: string[] = []): PyramidTenBoard {
  const discarded = cards(...discard);
  for (const c of discarded) c.isCovered = false;
  return {
    drawPile: new Pile(cards(...draw)),
    discardPile: new DiscardPile(discarded),
    tableau: new Tableau(cards(...WINNABLE_TWO_ROWS), 2),
    completedPile: new Pile(),
  };
}
