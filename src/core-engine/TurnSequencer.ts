/**
 * Turn sequencer for Pyramid Ten.
 *
 * Provides functions to manage phase transitions and the turn
 * counter of a GameState. Operates on the state directly
 * (mutation-based), like the rest of the engine.
 */

import type { GamePhase, GameState } from './GameState';

// ── Query functions ─────────────────────────────────────────

/**
 * Whether the game has ended, won or lost.
 */
export function isGameOver(state: GameState): boolean {
  return state.phase === 'won' || state.phase === 'lost';
}

/**
 * Whether the game is in the active playing phase.
 */
export function isPlaying(state: GameState): boolean {
  return state.phase === 'playing';
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Count one accepted action.
 *
 * @throws If the game is not in the `playing` phase.
 */
export function advanceTurn(state: GameState): void {
  if (state.phase !== 'playing') {
    throw new Error(`Cannot advance turn in phase "${state.phase}"`);
  }
  state.turnNumber++;
}

/**
 * Transition the game to a new phase.
 *
 * Valid transitions:
 * - `setup`   -> `playing`
 * - `playing` -> `won` | `lost`
 *
 * @throws If the transition is invalid (e.g. `won` -> `playing`).
 * @throws If transitioning to the same phase.
 */
export function transitionTo(state: GameState, newPhase: GamePhase): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Game is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, readonly GamePhase[]> = {
  setup: ['playing'],
  playing: ['won', 'lost'],
  won: [],
  lost: [],
};

// ── Convenience ─────────────────────────────────────────────

/** Start the game (transition from setup to playing). */
export function startGame(state: GameState): void {
  transitionTo(state, 'playing');
}

/** End the game with a win. */
export function winGame(state: GameState): void {
  transitionTo(state, 'won');
}

/** End the game with a loss. */
export function loseGame(state: GameState): void {
  transitionTo(state, 'lost');
}
