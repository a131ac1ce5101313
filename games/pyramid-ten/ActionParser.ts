/**
 * Action grammar for Pyramid Ten.
 *
 * Lines arrive already trimmed and lowercased. A line is either a
 * single command word (`d`, `h`, `?`, `q` and their long forms) or up
 * to two whitespace-separated card specifiers of the form
 * `<rank><suit>`:
 *
 *   rank  `1`-`10`, or `a`, `j`, `q`, `k`
 *   suit  `c`, `d`, `h`, `s`
 *
 * e.g. `5h 5s` or `kd`.
 */

import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { isRank } from '../../src/card-system/Card';
import {
  InvalidRankSpecifierError,
  MalformedSpecifierError,
} from './ActionErrors';

// ── Types ───────────────────────────────────────────────────

/** A parsed `<rank><suit>` token. */
export interface CardSpecifier {
  /** The token as typed. */
  readonly input: string;
  readonly rank: Rank;
  readonly suit: Suit;
}

/** Draw the top card of the draw pile onto the discard pile. */
export interface DrawCommand {
  readonly kind: 'draw';
}

/** Remove a King, or two cards adding up to ten. */
export interface PairCommand {
  readonly kind: 'pair';
  readonly specifiers: readonly CardSpecifier[];
}

/** Commands the runner answers without touching the board. */
export interface MetaCommand {
  readonly kind: 'hint' | 'help' | 'quit';
}

export type PlayerCommand = DrawCommand | PairCommand | MetaCommand;

/** The actions the engine resolves. */
export type PlayerAction = DrawCommand | PairCommand;

// ── Lookup tables ───────────────────────────────────────────

const SUIT_CODES: Readonly<Record<string, Suit>> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
};

const LETTER_RANKS: Readonly<Record<string, Rank>> = {
  a: 1,
  j: 8,
  q: 9,
  k: 10,
};

type CommandWord = 'draw' | MetaCommand['kind'];

const COMMAND_WORDS: ReadonlyMap<string, CommandWord> = new Map<string, CommandWord>([
  ['d', 'draw'],
  ['draw', 'draw'],
  ['h', 'hint'],
  ['hint', 'hint'],
  ['?', 'help'],
  ['help', 'help'],
  ['rules', 'help'],
  ['q', 'quit'],
  ['quit', 'quit'],
]);

const SPECIFIER_PATTERN = /^(\d{1,2}|[ajqk])([cdhs])$/;

// ── Parsing ─────────────────────────────────────────────────

/**
 * Parse one `<rank><suit>` token.
 *
 * @throws InvalidRankSpecifierError for a numeric rank outside 1-10.
 * @throws MalformedSpecifierError for anything else that does not match.
 */
export function parseSpecifier(input: string): CardSpecifier {
  const match = SPECIFIER_PATTERN.exec(input);
  if (!match) {
    throw new MalformedSpecifierError(input);
  }

  const [, rankText, suitCode] = match;
  const suit = SUIT_CODES[suitCode];

  const letterRank = LETTER_RANKS[rankText];
  if (letterRank !== undefined) {
    return { input, rank: letterRank, suit };
  }

  const numeric = Number.parseInt(rankText, 10);
  if (!isRank(numeric)) {
    throw new InvalidRankSpecifierError(input, numeric);
  }
  return { input, rank: numeric, suit };
}

/**
 * Parse a whole input line into a command.
 *
 * An empty line parses as a pair with no specifiers, which the engine
 * rejects as a wrong selection count.
 */
export function parseCommand(line: string): PlayerCommand {
  const word = COMMAND_WORDS.get(line);
  if (word !== undefined) {
    return word === 'draw' ? { kind: 'draw' } : { kind: word };
  }

  const tokens = line.split(/\s+/).filter((token) => token.length > 0);
  return { kind: 'pair', specifiers: tokens.map(parseSpecifier) };
}

/** The shortest specifier that selects this card, e.g. `kh` or `5s`. */
export function specifierFor(card: Pick<Card, 'rank' | 'suit'>): string {
  const letter = Object.keys(LETTER_RANKS).find(
    (key) => LETTER_RANKS[key] === card.rank,
  );
  return `${letter ?? card.rank}${card.suit.charAt(0)}`;
}
