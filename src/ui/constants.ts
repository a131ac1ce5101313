/**
 * Shared layout constants for the terminal UI.
 */

/** Width of one card in columns. */
export const CARD_WIDTH = 5;

/** Columns between two cards on the same row. */
export const CARD_GAP = 1;

/** Indent per tableau row of depth, half a card plus half a gap. */
export const ROW_OFFSET = (CARD_WIDTH + CARD_GAP) / 2;
