/**
 * Pyramid Ten game orchestration -- ties together the deck, the piles,
 * the tableau, the rules and the turn sequencer into a playable game.
 *
 * Provides:
 *   - Game setup (shuffle or injected deck, tableau deal)
 *   - Turn execution (draw, or validate-then-commit removal)
 *   - The turn boundary that turns action errors into rejections
 *   - Win / loss detection
 */

import type { Card } from '../../src/card-system/Card';
import { createTenRankDeck, shuffle, DECK_SIZE } from '../../src/card-system/Deck';
import { Pile, DrawEmptyError } from '../../src/card-system/Pile';
import { DiscardPile } from '../../src/card-system/DiscardPile';
import { createGameState } from '../../src/core-engine/GameState';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { snapshotCard } from '../../src/core-engine/SnapshotTypes';
import {
  advanceTurn,
  isPlaying,
  loseGame,
  startGame,
  winGame,
} from '../../src/core-engine/TurnSequencer';
import { ActionError } from './ActionErrors';
import type { CardSpecifier, PlayerAction } from './ActionParser';
import type { PyramidTenSession } from './PyramidTenState';
import { applyRemoval, planRemoval } from './PyramidTenRules';
import { DEFAULT_ROW_COUNT, Tableau } from './Tableau';
import type { RowFold, UncoveredCard } from './Tableau';

// ── Setup ───────────────────────────────────────────────────

export interface PyramidTenSetupOptions {
  /** Number of normal tableau rows (default 6). */
  rows?: number;
  /** RNG for shuffling (default Math.random). Ignored when `deck` is given. */
  rng?: () => number;
  /**
   * A pre-arranged 40-card deck, last element on top. The tableau is
   * dealt from the top; the rest becomes the draw pile.
   */
  deck?: readonly Card[];
  /** Emitter to publish game events on (default: a new one). */
  events?: GameEventEmitter;
}

/**
 * Set up a new game: shuffle (or take the injected deck), deal the
 * tableau from the top of the deck, and start playing.
 *
 * @throws If an injected deck does not hold exactly 40 distinct cards.
 */
export function setupPyramidTenGame(
  options: PyramidTenSetupOptions = {},
): PyramidTenSession {
  const {
    rows = DEFAULT_ROW_COUNT,
    rng = Math.random,
    deck,
    events = new GameEventEmitter(),
  } = options;

  const cards = deck ? [...deck] : shuffle(createTenRankDeck(), rng);
  const distinct = new Set(cards.map((c) => `${c.suit}:${c.rank}`));
  if (cards.length !== DECK_SIZE || distinct.size !== DECK_SIZE) {
    throw new Error(
      `A game requires ${DECK_SIZE} distinct cards, got ${cards.length}`,
    );
  }
  for (const card of cards) {
    card.isCovered = true;
  }

  const drawPile = new Pile(cards);
  const tableau = Tableau.deal(drawPile, rows);

  const session: PyramidTenSession = {
    ...createGameState(),
    rowCount: rows,
    drawPile,
    discardPile: new DiscardPile(),
    tableau,
    completedPile: new Pile(),
    events,
  };
  startGame(session);
  return session;
}

// ── Turn execution ──────────────────────────────────────────

/** A card moved from the draw pile to the discard pile. */
export interface DrawTurn {
  readonly kind: 'drawn';
  readonly card: Card;
}

/** One King or a pair moved to the completed pile. */
export interface RemovalTurn {
  readonly kind: 'removed';
  readonly cards: readonly Card[];
  readonly uncovered: readonly UncoveredCard[];
  readonly folds: readonly RowFold[];
}

export type TurnResult = DrawTurn | RemovalTurn;

/**
 * Resolve one action against the session.
 *
 * Removals are validated completely before any card moves. A draw from
 * an empty draw pile loses the game.
 *
 * @throws ActionError if the action is rejected; nothing has changed.
 * @throws DrawEmptyError after moving the session to `lost`.
 * @throws If the game is not in the `playing` phase.
 */
export function executeTurn(
  session: PyramidTenSession,
  action: PlayerAction,
): TurnResult {
  if (!isPlaying(session)) {
    throw new Error(`Cannot act on a game in phase "${session.phase}"`);
  }

  const result =
    action.kind === 'draw'
      ? drawAndDiscard(session)
      : removeCards(session, action.specifiers);

  advanceTurn(session);
  if (session.tableau.isCleared()) {
    winGame(session);
  }

  session.events.emit('turn-completed', {
    turnNumber: session.turnNumber,
    phase: session.phase,
  });
  if (session.phase === 'won') {
    session.events.emit('game-ended', {
      outcome: 'won',
      finalTurnNumber: session.turnNumber,
      reason: 'The tableau is clear',
    });
  }
  return result;
}

function drawAndDiscard(session: PyramidTenSession): DrawTurn {
  let card: Card;
  try {
    card = session.drawPile.draw();
  } catch (err) {
    if (err instanceof DrawEmptyError) {
      loseGame(session);
      session.events.emit('game-ended', {
        outcome: 'lost',
        finalTurnNumber: session.turnNumber,
        reason: 'The draw pile is empty',
      });
    }
    throw err;
  }

  session.discardPile.put(card);
  session.events.emit('card-drawn', {
    card: snapshotCard(card),
    drawRemaining: session.drawPile.size(),
  });
  return { kind: 'drawn', card };
}

function removeCards(
  session: PyramidTenSession,
  specifiers: readonly CardSpecifier[],
): RemovalTurn {
  const plan = planRemoval(session, specifiers);
  const applied = applyRemoval(session, plan);

  session.events.emit('cards-removed', {
    cards: applied.removed.map(snapshotCard),
    completedCount: session.completedPile.size(),
  });
  for (const { card, address } of applied.uncovered) {
    session.events.emit('card-uncovered', {
      card: snapshotCard(card),
      row: address.kind === 'normal' ? address.row : null,
      col: address.col,
    });
  }
  for (const fold of applied.folds) {
    session.events.emit('row-folded', fold);
  }

  return {
    kind: 'removed',
    cards: applied.removed,
    uncovered: applied.uncovered,
    folds: applied.folds,
  };
}

// ── Turn boundary ───────────────────────────────────────────

export type TurnOutcome =
  | { readonly status: 'accepted'; readonly result: TurnResult }
  | { readonly status: 'rejected'; readonly error: ActionError };

/**
 * Report a rejected action on the session's event stream.
 */
export function rejectAction(
  session: PyramidTenSession,
  error: ActionError,
): TurnOutcome {
  session.events.emit('action-rejected', {
    kind: error.kind,
    message: error.message,
  });
  return { status: 'rejected', error };
}

/**
 * Play one turn, turning recoverable action errors into a rejection.
 * Only DrawEmptyError (the loss) and programming errors propagate.
 */
export function playTurn(
  session: PyramidTenSession,
  action: PlayerAction,
): TurnOutcome {
  try {
    return { status: 'accepted', result: executeTurn(session, action) };
  } catch (err) {
    if (err instanceof ActionError) {
      return rejectAction(session, err);
    }
    throw err;
  }
}

// ── Inspection ──────────────────────────────────────────────

/**
 * Total number of cards across the four collections; always 40.
 */
export function countCards(session: PyramidTenSession): number {
  return (
    session.drawPile.size() +
    session.discardPile.size() +
    session.tableau.occupiedCount() +
    session.completedPile.size()
  );
}
