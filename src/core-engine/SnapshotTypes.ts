/**
 * Shared snapshot types for Pyramid Ten.
 *
 * Provides the canonical CardSnapshot interface and snapshotCard()
 * helper used by board views and event payloads, so that consumers
 * never hold a reference to a live Card.
 */

import type { Card, Rank, Suit } from '../card-system/Card';

// ── Snapshot types ──────────────────────────────────────────

/**
 * Serializable card snapshot (no identity).
 *
 * Captures rank, suit, and covered state so that renderers can
 * draw a card without touching the collections that own it.
 */
export interface CardSnapshot {
  readonly rank: Rank;
  readonly suit: Suit;
  readonly isCovered: boolean;
}

// ── Helpers ─────────────────────────────────────────────────

/** Create a serializable snapshot of a card. */
export function snapshotCard(card: Card): CardSnapshot {
  return {
    rank: card.rank,
    suit: card.suit,
    isCovered: card.isCovered,
  };
}
