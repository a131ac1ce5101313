/**
 * Read-only board views for Pyramid Ten.
 *
 * A BoardView holds snapshots only, so a presentation layer can draw
 * the game without ever holding a live Card.
 */

import type { Card } from '../../src/card-system/Card';
import type { GamePhase } from '../../src/core-engine/GameState';
import type { CardSnapshot } from '../../src/core-engine/SnapshotTypes';
import { snapshotCard } from '../../src/core-engine/SnapshotTypes';
import type { PyramidTenSession } from './PyramidTenState';

/** A tableau slot: a card, or `null` once the card has been removed. */
export type SlotView = CardSnapshot | null;

/** Everything a renderer needs after a turn. */
export interface BoardView {
  readonly phase: GamePhase;
  readonly turnNumber: number;
  /** Normal rows, apex first; row `r` has `r + 1` slots. */
  readonly rows: ReadonlyArray<readonly SlotView[]>;
  /** The terminal row, or `null` once it has folded away. */
  readonly terminalRow: readonly SlotView[] | null;
  /** Up to two playable discard cards, the top last. */
  readonly discardTop: readonly CardSnapshot[];
  readonly discardCount: number;
  readonly drawCount: number;
  /** The top of the draw pile as it lies (covered), or `null` when empty. */
  readonly drawTop: CardSnapshot | null;
  readonly completedCount: number;
  /** The last removed card (covered again), or `null` when none. */
  readonly completedTop: CardSnapshot | null;
}

function snapshotSlot(card: Card | null): SlotView {
  return card === null ? null : snapshotCard(card);
}

function snapshotOptional(card: Card | undefined): CardSnapshot | null {
  return card === undefined ? null : snapshotCard(card);
}

/** Build a read-only view of the session's current state. */
export function getBoardView(session: PyramidTenSession): BoardView {
  const { tableau, discardPile, drawPile, completedPile } = session;
  const terminal = tableau.terminal();

  const discardTop: CardSnapshot[] = [];
  const second = discardPile.peekSecond();
  const top = discardPile.peek();
  if (second) discardTop.push(snapshotCard(second));
  if (top) discardTop.push(snapshotCard(top));

  return {
    phase: session.phase,
    turnNumber: session.turnNumber,
    rows: tableau.rows().map((row) => row.slots.map(snapshotSlot)),
    terminalRow: terminal ? terminal.slots.map(snapshotSlot) : null,
    discardTop,
    discardCount: discardPile.size(),
    drawCount: drawPile.size(),
    drawTop: snapshotOptional(drawPile.peek()),
    completedCount: completedPile.size(),
    completedTop: snapshotOptional(completedPile.peek()),
  };
}
