/**
 * Tests for GameRunner -- the interactive loop, driven by a scripted
 * reader and a recording writer.
 */

import { describe, it, expect } from 'vitest';
import type { LineReader, TextWriter } from '../../src/ui/TerminalIo';
import { ACTION_PROMPT, RULES_TEXT, renderBoard } from '../../games/pyramid-ten/BoardRenderer';
import { getBoardView } from '../../games/pyramid-ten/BoardView';
import { runGame } from '../../games/pyramid-ten/GameRunner';
import { setupPyramidTenGame } from '../../games/pyramid-ten/PyramidTenGame';
import type { PyramidTenSession } from '../../games/pyramid-ten/PyramidTenState';
import { WINNABLE_TWO_ROWS, arrangeDeck } from './helpers';

class ScriptedReader implements LineReader {
  readonly prompts: string[] = [];

  constructor(private readonly lines: string[]) {}

  async readLine(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.lines.shift() ?? null;
  }
}

class RecordingWriter implements TextWriter {
  readonly texts: string[] = [];

  write(text: string): void {
    this.texts.push(text);
  }
}

function winnableGame(): PyramidTenSession {
  return setupPyramidTenGame({ rows: 2, deck: arrangeDeck(WINNABLE_TWO_ROWS) });
}

describe('runGame', () => {
  it('should play a game to a win', async () => {
    const session = winnableGame();
    const firstBoard = renderBoard(getBoardView(session));
    const output = new RecordingWriter();

    const outcome = await runGame(session, new ScriptedReader(['6d 4d', '3c 7c', 'kh']), output);

    expect(outcome).toBe('won');
    expect(output.texts).toHaveLength(5);
    expect(output.texts[0]).toBe(firstBoard);
    expect(output.texts[3]).toBe('The tableau is clear! You win.');
    expect(output.texts[4]).toBe(renderBoard(getBoardView(session)));
  });

  it('should report the end of the game once and drop its listener', async () => {
    const session = winnableGame();
    const output = new RecordingWriter();

    await runGame(session, new ScriptedReader(['6d 4d', '3c 7c', 'kh']), output);

    expect(output.texts.filter((t) => t === 'The tableau is clear! You win.')).toHaveLength(1);
    expect(session.events.listenerCount('game-ended')).toBe(0);
  });

  it('should report rejected input and ask again', async () => {
    const session = winnableGame();
    const output = new RecordingWriter();
    const reader = new ScriptedReader(['zz', '6d 3c', '', 'q']);

    const outcome = await runGame(session, reader, output);

    expect(outcome).toBe('quit');
    expect(output.texts.slice(1)).toEqual([
      'Invalid card selection: could not identify a rank and suit in "zz"',
      'The 3 of Clubs is not available, got "3c"',
      'Select one King or two cards adding up to 10, got 0 cards',
    ]);
    expect(reader.prompts).toEqual([ACTION_PROMPT, ACTION_PROMPT, ACTION_PROMPT, ACTION_PROMPT]);
    expect(session.turnNumber).toBe(0);
  });

  it('should answer help and hint without taking a turn', async () => {
    const session = winnableGame();
    const output = new RecordingWriter();

    await runGame(session, new ScriptedReader(['?', 'h', 'q']), output);

    expect(output.texts.slice(1)).toEqual([RULES_TEXT, 'You can remove: 6d 4d']);
    expect(session.turnNumber).toBe(0);
  });

  it('should stop when the input runs out', async () => {
    const output = new RecordingWriter();
    expect(await runGame(winnableGame(), new ScriptedReader([]), output)).toBe('abandoned');
    expect(output.texts).toHaveLength(1);
  });

  it('should end in a loss when drawing from an empty draw pile', async () => {
    const session = winnableGame();
    const output = new RecordingWriter();
    const lines = Array.from({ length: 36 }, () => 'd');

    const outcome = await runGame(session, new ScriptedReader(lines), output);

    expect(outcome).toBe('lost');
    expect(session.phase).toBe('lost');
    expect(output.texts).toHaveLength(37);
    expect(output.texts[36]).toBe('The draw pile is empty! You lose.');
  });

  it('should write card movements in verbose mode', async () => {
    const session = winnableGame();
    const output = new RecordingWriter();

    await runGame(session, new ScriptedReader(['d', '6d 4d', 'q']), output, { verbose: true });

    expect(output.texts.filter((text) => !text.includes('Cards in deck'))).toEqual([
      'Drew the King of Spades (34 left in the deck)',
      'Removed 6 of Diamonds and 4 of Diamonds',
      'Uncovered the 3 of Clubs at row 1, column 0',
      'Uncovered the 7 of Clubs at row 1, column 1',
      'The terminal row is gone',
    ]);
  });

  it('should announce each turn and unsubscribe when done', async () => {
    const session = winnableGame();
    const started: number[] = [];
    session.events.on('turn-started', ({ turnNumber }) => started.push(turnNumber));

    await runGame(session, new ScriptedReader(['d', 'zz', 'q']), new RecordingWriter());

    expect(started).toEqual([0, 1, 1]);
    expect(session.events.listenerCount('action-rejected')).toBe(0);
    expect(session.events.listenerCount('game-ended')).toBe(0);
  });

  it('should refuse a game that is already over', async () => {
    const session = winnableGame();
    await runGame(session, new ScriptedReader(['6d 4d', '3c 7c', 'kh']), new RecordingWriter());

    await expect(
      runGame(session, new ScriptedReader([]), new RecordingWriter()),
    ).rejects.toThrow('Cannot run a game in phase "won"');
  });
});
