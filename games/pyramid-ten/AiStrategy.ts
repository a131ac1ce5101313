/**
 * Automated players for Pyramid Ten.
 *
 * Provides:
 *   - AiStrategy interface: chooseAction(board, rng)
 *   - RandomStrategy: uniformly random legal action
 *   - GreedyStrategy: removes whenever it can, preferring tableau cards
 *   - AiPlayer: wrapper that binds a strategy and RNG
 *   - playOut: drive a session to its end with one player
 */

import type { FinalPhase } from '../../src/core-engine/GameState';
import { DrawEmptyError } from '../../src/card-system/Pile';
import type { PlayerAction } from './ActionParser';
import { executeTurn } from './PyramidTenGame';
import { findLegalActions, resolveSelection } from './PyramidTenRules';
import type { PyramidTenBoard, PyramidTenSession } from './PyramidTenState';

// ── Strategy interface ──────────────────────────────────────

/**
 * A strategy chooses the next action given the current board.
 */
export interface AiStrategy {
  /** Human-readable strategy name. */
  readonly name: string;

  /**
   * Choose an action. When nothing is legal the strategy draws, which
   * ends the game.
   */
  chooseAction(board: PyramidTenBoard, rng: () => number): PlayerAction;
}

const DRAW: PlayerAction = { kind: 'draw' };

// ── RandomStrategy ──────────────────────────────────────────

/**
 * Selects a uniformly random legal action each turn.
 */
export const RandomStrategy: AiStrategy = {
  name: 'random',

  chooseAction(board: PyramidTenBoard, rng: () => number): PlayerAction {
    const actions = findLegalActions(board);
    if (actions.length === 0) return DRAW;
    return actions[Math.floor(rng() * actions.length)];
  },
};

// ── GreedyStrategy ──────────────────────────────────────────

/** Number of tableau cards a removal takes. */
function tableauCardsUsed(board: PyramidTenBoard, action: PlayerAction): number {
  if (action.kind !== 'pair') return -1;
  return action.specifiers.filter(
    (spec) => resolveSelection(board, spec).source === 'tableau',
  ).length;
}

/**
 * Removes cards whenever possible, preferring removals that take the
 * most tableau cards (ties go to the first found). Draws otherwise.
 */
export const GreedyStrategy: AiStrategy = {
  name: 'greedy',

  chooseAction(board: PyramidTenBoard): PlayerAction {
    let best: PlayerAction = DRAW;
    let bestScore = -1;
    for (const action of findLegalActions(board)) {
      const score = tableauCardsUsed(board, action);
      if (score > bestScore) {
        best = action;
        bestScore = score;
      }
    }
    return best;
  },
};

// ── AiPlayer ────────────────────────────────────────────────

/**
 * Binds a strategy to its own RNG.
 */
export class AiPlayer {
  constructor(
    readonly strategy: AiStrategy,
    private readonly rng: () => number = Math.random,
  ) {}

  chooseAction(board: PyramidTenBoard): PlayerAction {
    return this.strategy.chooseAction(board, this.rng);
  }
}

/** Every game ends within this many actions: at most 40 removals and 39 draws. */
const MAX_TURNS = 200;

/**
 * Let `player` play the session until it is won or lost.
 *
 * @throws If the game has not ended after MAX_TURNS actions.
 */
export function playOut(session: PyramidTenSession, player: AiPlayer): FinalPhase {
  for (let turn = 0; turn < MAX_TURNS; turn++) {
    if (session.phase === 'won' || session.phase === 'lost') {
      return session.phase;
    }
    try {
      executeTurn(session, player.chooseAction(session));
    } catch (err) {
      if (!(err instanceof DrawEmptyError)) throw err;
    }
  }
  if (session.phase === 'won' || session.phase === 'lost') {
    return session.phase;
  }
  throw new Error(`Game did not end after ${MAX_TURNS} turns`);
}
