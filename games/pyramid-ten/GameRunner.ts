/**
 * Interactive run loop for Pyramid Ten.
 *
 * Reads one line per turn from a LineReader, resolves it against the
 * session, and writes the board and the outcome of each action to a
 * TextWriter. Everything the player sees about a turn comes from the
 * session's events.
 */

import { cardName } from '../../src/card-system/Card';
import { DrawEmptyError } from '../../src/card-system/Pile';
import type { FinalPhase } from '../../src/core-engine/GameState';
import type { CardSnapshot } from '../../src/core-engine/SnapshotTypes';
import { isPlaying } from '../../src/core-engine/TurnSequencer';
import type { LineReader, TextWriter } from '../../src/ui/TerminalIo';
import { ActionError } from './ActionErrors';
import { parseCommand } from './ActionParser';
import type { PlayerCommand } from './ActionParser';
import { ACTION_PROMPT, RULES_TEXT, renderBoard, renderHint } from './BoardRenderer';
import { getBoardView } from './BoardView';
import { playTurn, rejectAction } from './PyramidTenGame';
import type { PyramidTenSession } from './PyramidTenState';
import { findLegalActions } from './PyramidTenRules';

/** How a run ended: the game's final phase, or the player walked away. */
export type RunOutcome = FinalPhase | 'quit' | 'abandoned';

export interface RunOptions {
  /** Also write card movements (draws, removals, uncovers, folds). */
  verbose?: boolean;
}

const GAME_OVER_MESSAGES: Readonly<Record<FinalPhase, string>> = {
  won: 'The tableau is clear! You win.',
  lost: 'The draw pile is empty! You lose.',
};

function names(cards: readonly CardSnapshot[]): string {
  return cards.map(cardName).join(' and ');
}

/**
 * Write the session's events to `output`. Returns the unsubscribe
 * functions.
 */
function reportEvents(
  session: PyramidTenSession,
  output: TextWriter,
  verbose: boolean,
): Array<() => void> {
  const { events } = session;
  const subscriptions = [
    events.on('action-rejected', ({ message }) => output.write(message)),
    events.once('game-ended', ({ outcome }) => output.write(GAME_OVER_MESSAGES[outcome])),
  ];
  if (!verbose) return subscriptions;

  subscriptions.push(
    events.on('card-drawn', ({ card, drawRemaining }) =>
      output.write(`Drew the ${cardName(card)} (${drawRemaining} left in the deck)`),
    ),
    events.on('cards-removed', ({ cards }) => output.write(`Removed ${names(cards)}`)),
    events.on('card-uncovered', ({ card, row, col }) =>
      output.write(
        `Uncovered the ${cardName(card)} at ${row === null ? 'terminal row' : `row ${row}`}, column ${col}`,
      ),
    ),
    events.on('row-folded', ({ terminal, rowCount }) =>
      output.write(
        terminal
          ? 'The terminal row is gone'
          : `A pyramid row folded away, ${rowCount} left`,
      ),
    ),
  );
  return subscriptions;
}

/** Parse a line, reporting a rejection instead of throwing. */
function parseOrReject(session: PyramidTenSession, line: string): PlayerCommand | null {
  try {
    return parseCommand(line);
  } catch (err) {
    if (!(err instanceof ActionError)) throw err;
    rejectAction(session, err);
    return null;
  }
}

/**
 * Play `session` interactively until it ends, the player quits, or the
 * input runs out.
 */
export async function runGame(
  session: PyramidTenSession,
  input: LineReader,
  output: TextWriter,
  options: RunOptions = {},
): Promise<RunOutcome> {
  if (!isPlaying(session)) {
    throw new Error(`Cannot run a game in phase "${session.phase}"`);
  }
  const subscriptions = reportEvents(session, output, options.verbose ?? false);

  try {
    output.write(renderBoard(getBoardView(session)));

    for (;;) {
      if (session.phase === 'won' || session.phase === 'lost') {
        return session.phase;
      }
      session.events.emit('turn-started', { turnNumber: session.turnNumber });
      const line = await input.readLine(ACTION_PROMPT);
      if (line === null) return 'abandoned';

      const command = parseOrReject(session, line);
      if (command === null) continue;

      switch (command.kind) {
        case 'quit':
          return 'quit';
        case 'help':
          output.write(RULES_TEXT);
          continue;
        case 'hint':
          output.write(renderHint(findLegalActions(session)));
          continue;
      }

      try {
        const outcome = playTurn(session, command);
        if (outcome.status === 'rejected') continue;
      } catch (err) {
        if (err instanceof DrawEmptyError) return 'lost';
        throw err;
      }

      output.write(renderBoard(getBoardView(session)));
    }
  } finally {
    for (const unsubscribe of subscriptions) unsubscribe();
  }
}
