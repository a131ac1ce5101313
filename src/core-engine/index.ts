/**
 * Core Engine Module
 *
 * Game lifecycle, turn sequencing, card snapshots and the typed
 * event emitter shared by the game and its presentation layer.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, FinalPhase, GameState } from './GameState';
export { createGameState } from './GameState';

// Turn sequencer functions
export {
  isGameOver,
  isPlaying,
  advanceTurn,
  transitionTo,
  startGame,
  winGame,
  loseGame,
} from './TurnSequencer';

// Game event system
export type {
  TurnStartedPayload,
  TurnCompletedPayload,
  CardDrawnPayload,
  CardsRemovedPayload,
  CardUncoveredPayload,
  RowFoldedPayload,
  ActionRejectedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Shared snapshot types
export type { CardSnapshot } from './SnapshotTypes';
export { snapshotCard } from './SnapshotTypes';
