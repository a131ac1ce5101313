/**
 * Typed Event Emitter for Pyramid Ten.
 *
 * Provides a type-safe, zero-dependency event emitter for turn lifecycle
 * and card movement events. The engine never writes output itself; it
 * emits these events and the runner (or a test) decides what to do
 * with them.
 */

import type { FinalPhase, GamePhase } from './GameState';
import type { CardSnapshot } from './SnapshotTypes';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted when the engine starts waiting for an action.
 */
export interface TurnStartedPayload {
  /** Number of actions accepted so far. */
  readonly turnNumber: number;
}

/**
 * Emitted when an action has been accepted and fully resolved.
 */
export interface TurnCompletedPayload {
  /** The turn number after the action. */
  readonly turnNumber: number;
  /** Current game phase after the action. */
  readonly phase: GamePhase;
}

/**
 * Emitted when a card moves from the draw pile to the discard pile.
 */
export interface CardDrawnPayload {
  readonly card: CardSnapshot;
  /** Cards left in the draw pile after the draw. */
  readonly drawRemaining: number;
}

/**
 * Emitted when one card (a King) or a pair is moved to the completed pile.
 */
export interface CardsRemovedPayload {
  readonly cards: readonly CardSnapshot[];
  /** Size of the completed pile after the removal. */
  readonly completedCount: number;
}

/**
 * Emitted when a tableau card loses its last coverer.
 */
export interface CardUncoveredPayload {
  readonly card: CardSnapshot;
  /** Row index from the apex, or `null` for the terminal row. */
  readonly row: number | null;
  readonly col: number;
}

/**
 * Emitted when the bottom row of the tableau empties and folds away.
 */
export interface RowFoldedPayload {
  /** Whether the folded row was the terminal row. */
  readonly terminal: boolean;
  /** Number of normal rows left after the fold. */
  readonly rowCount: number;
}

/**
 * Emitted when an action is rejected without changing the board.
 */
export interface ActionRejectedPayload {
  /** Error kind, e.g. `InvalidPair`. */
  readonly kind: string;
  readonly message: string;
}

/**
 * Emitted when the game has ended.
 */
export interface GameEndedPayload {
  readonly outcome: FinalPhase;
  /** Final turn number. */
  readonly finalTurnNumber: number;
  /** Optional human-readable reason. */
  readonly reason?: string;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'turn-started': TurnStartedPayload;
  'turn-completed': TurnCompletedPayload;
  'card-drawn': CardDrawnPayload;
  'cards-removed': CardsRemovedPayload;
  'card-uncovered': CardUncoveredPayload;
  'row-folded': RowFoldedPayload;
  'action-rejected': ActionRejectedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('card-drawn', ({ card, drawRemaining }) => {
 *   console.log(`Drew ${card.rank}, ${drawRemaining} left`);
 * });
 * ```
 */
export class GameEventEmitter {
  private readonly listeners: {
    [K in GameEventName]?: Array<GameEventListener<K>>;
  } = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    let list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) {
      list = [];
      (this.listeners as Record<string, unknown>)[event] = list;
    }
    list.push(listener);

    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function.
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list = this.listeners[event] as
      | Array<GameEventListener<K>>
      | undefined;
    if (!list || list.length === 0) return;

    // Copy so listeners can unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }

  /**
   * Return the number of listeners for a given event.
   */
  listenerCount(event: GameEventName): number {
    const list = this.listeners[event];
    return list ? list.length : 0;
  }
}
