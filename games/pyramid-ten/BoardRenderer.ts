/**
 * Terminal rendering for Pyramid Ten.
 *
 * Draws a BoardView as text: the pyramid (each row indented half a card
 * further than the one below it), the terminal row, then the draw,
 * discard and completed piles with their card counts.
 */

import { drawCardRow, drawPileTop } from '../../src/ui/CardArt';
import { ROW_OFFSET } from '../../src/ui/constants';
import { renderHelp } from '../../src/ui/HelpText';
import type { HelpSection } from '../../src/ui/HelpText';
import type { PlayerAction } from './ActionParser';
import type { BoardView } from './BoardView';

/** Prompt shown while waiting for an action. */
export const ACTION_PROMPT =
  'Draw & discard (d), name one King or two cards adding up to 10 (e.g. "5h 5s"), hint (h), rules (?) or quit (q): ';

/** Rules shown at startup and on `?`. */
export const HELP_SECTIONS: readonly HelpSection[] = [
  {
    heading: 'Goal',
    body:
      'Clear the pyramid. Cards leave the table one King at a time, or in pairs\n' +
      'whose ranks add up to 10 (A=1, J=8, Q=9, K=10).',
  },
  {
    heading: 'The table',
    body:
      'Only face-up cards can be used. A pyramid card turns face-up once both\n' +
      'cards resting on it are gone; the cards of the bottom row of the pyramid\n' +
      'each wait for the single card beneath them.',
  },
  {
    heading: 'Drawing',
    body:
      'Enter "d" to turn the top card of the deck onto the discard pile. The top\n' +
      'two discarded cards are in play, but the card under the top can only be\n' +
      'paired with the top card itself. Drawing from an empty deck loses the game.',
  },
  {
    heading: 'Naming cards',
    body:
      'A card is its rank (1-10, or a, j, q, k) followed by its suit (c, d, h, s):\n' +
      '"kd" removes the King of Diamonds, "3c 7h" pairs two cards.',
  },
];

/** The rules banner. */
export const RULES_TEXT = renderHelp(HELP_SECTIONS);

/**
 * Render the board as lines of text joined with newlines.
 */
export function renderBoard(view: BoardView): string {
  const lines: string[] = [];
  const rowCount = view.rows.length;

  view.rows.forEach((row, index) => {
    lines.push(...drawCardRow(row, ROW_OFFSET * (rowCount - index - 1)));
  });
  if (view.terminalRow) {
    lines.push(...drawCardRow(view.terminalRow));
  }

  lines.push('', `Cards in deck: ${view.drawCount}`, ...drawPileTop(view.drawTop));

  lines.push('', `Discarded cards: ${view.discardCount}`);
  lines.push(
    ...(view.discardTop.length > 0
      ? drawCardRow(view.discardTop)
      : drawPileTop(null)),
  );

  lines.push(
    '',
    `Completed cards: ${view.completedCount}`,
    ...drawPileTop(view.completedTop),
  );

  return lines.join('\n');
}

/**
 * Describe the legal actions for the `hint` command.
 */
export function renderHint(actions: readonly PlayerAction[]): string {
  const removals = actions.flatMap((action) =>
    action.kind === 'pair' ? [action.specifiers.map((s) => s.input).join(' ')] : [],
  );
  if (removals.length > 0) {
    return `You can remove: ${removals.join(', ')}`;
  }
  return actions.some((action) => action.kind === 'draw')
    ? 'Nothing to remove; draw a card (d).'
    : 'Nothing to remove and nothing left to draw.';
}
