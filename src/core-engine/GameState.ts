/**
 * Game phase and state types for Pyramid Ten.
 *
 * GamePhase represents the high-level lifecycle of a single-player
 * game. GameState is the part of a session the turn sequencer owns:
 * the phase and the turn counter.
 */

/**
 * High-level phases of a game.
 *
 * - `setup`   -- Dealing the tableau and the draw pile.
 * - `playing` -- Awaiting and resolving player actions.
 * - `won`     -- The tableau has been cleared.
 * - `lost`    -- A draw was requested from an empty draw pile.
 */
export type GamePhase = 'setup' | 'playing' | 'won' | 'lost';

/** The phases that end a game. */
export type FinalPhase = Extract<GamePhase, 'won' | 'lost'>;

/**
 * Lifecycle state shared by every game session.
 */
export interface GameState {
  /** Current high-level phase. */
  phase: GamePhase;
  /** Monotonically increasing count of accepted actions (starts at 0). */
  turnNumber: number;
}

/**
 * Create a new GameState in the given phase (defaults to 'setup').
 */
export function createGameState(initialPhase: GamePhase = 'setup'): GameState {
  return {
    phase: initialPhase,
    turnNumber: 0,
  };
}
