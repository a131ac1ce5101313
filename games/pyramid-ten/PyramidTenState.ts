/**
 * Pyramid Ten state types.
 *
 * The four card collections of a game and the session that owns them,
 * kept apart from the rules and from the terminal runner.
 */

import type { Pile } from '../../src/card-system/Pile';
import type { DiscardPile } from '../../src/card-system/DiscardPile';
import type { GameState } from '../../src/core-engine/GameState';
import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { Tableau } from './Tableau';

/**
 * The collections every card lives in. Together they always hold
 * the whole deck, each card in exactly one of them.
 */
export interface PyramidTenBoard {
  /** Face-down stock; the top card is drawn onto the discard pile. */
  readonly drawPile: Pile;
  /** Drawn cards; the top two are in play. */
  readonly discardPile: DiscardPile;
  /** The triangle of cards to clear. */
  readonly tableau: Tableau;
  /** Removed cards, face-down again. */
  readonly completedPile: Pile;
}

/**
 * A complete Pyramid Ten game. Each session owns its collections and
 * its event emitter, so several games can run side by side.
 */
export interface PyramidTenSession extends GameState, PyramidTenBoard {
  /** Number of normal tableau rows dealt at the start. */
  readonly rowCount: number;
  /** Lifecycle and card movement events for this game. */
  readonly events: GameEventEmitter;
}
