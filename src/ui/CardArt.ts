/**
 * Card Art
 *
 * Terminal drawing helpers shared by every board renderer. A card is
 * four text layers tall and five columns wide:
 *
 *   ┌───┐
 *   │ Q │
 *   │ ♡ │
 *   └───┘
 *
 * Covered cards show `?` and `¿`; empty slots are blank.
 */

import { SUIT_SYMBOLS, rankSymbol } from '../card-system/Card';
import type { CardSnapshot } from '../core-engine/SnapshotTypes';
import { CARD_GAP, CARD_WIDTH } from './constants';

/** The four text layers of one card, top to bottom. */
export type CardLayers = readonly [string, string, string, string];

export const CARD_TOP = '┌───┐';
export const CARD_BOTTOM = '└───┘';

/** Outline drawn where a pile has no cards left. */
export const EMPTY_PILE_LAYERS: CardLayers = ['┌   ┐', '', '', '└   ┘'];

const BLANK = ' '.repeat(CARD_WIDTH);
const BLANK_LAYERS: CardLayers = [BLANK, BLANK, BLANK, BLANK];

/**
 * Return the text layers for a card, or blank layers for an empty slot.
 */
export function cardLayers(card: CardSnapshot | null): CardLayers {
  if (card === null) return BLANK_LAYERS;
  if (card.isCovered) return [CARD_TOP, '│ ? │', '│ ¿ │', CARD_BOTTOM];
  return [
    CARD_TOP,
    `│ ${rankSymbol(card.rank)} │`,
    `│ ${SUIT_SYMBOLS[card.suit]} │`,
    CARD_BOTTOM,
  ];
}

/**
 * Draw cards side by side, one line per layer, each line prefixed by
 * `indent` spaces. Trailing whitespace is trimmed.
 */
export function drawCardRow(
  cards: ReadonlyArray<CardSnapshot | null>,
  indent: number = 0,
): string[] {
  const layers = cards.map(cardLayers);
  const gap = ' '.repeat(CARD_GAP);
  const prefix = ' '.repeat(indent);

  return [0, 1, 2, 3].map((layer) =>
    (prefix + layers.map((l) => l[layer]).join(gap)).trimEnd(),
  );
}

/**
 * Draw the top card of a pile, or the empty outline.
 */
export function drawPileTop(card: CardSnapshot | null): string[] {
  return card === null ? [...EMPTY_PILE_LAYERS] : drawCardRow([card]);
}
