/**
 * Pyramid Ten rules -- card selection, pair validation, and removal.
 *
 * A removal names one or two cards:
 * - One card must be a King (rank 10) and must not be the card under
 *   the top of the discard pile.
 * - Two cards must be distinct and their ranks must add up to ten. If
 *   one of them is the card under the discard top, the other must be
 *   the discard top itself.
 *
 * Cards are looked up in the discard pile first (top, then the card
 * beneath it), then in the tableau. Validation never mutates; the plan
 * it produces is applied separately, so a rejected removal leaves the
 * board untouched.
 */

import type { Card } from '../../src/card-system/Card';
import { PAIR_TOTAL, canPair, cardName } from '../../src/card-system/Card';
import {
  ActionError,
  BelowTopOfPileError,
  CardUnavailableError,
  InvalidPairError,
  WrongSelectionCountError,
} from './ActionErrors';
import type { CardSpecifier, PlayerAction } from './ActionParser';
import { specifierFor } from './ActionParser';
import type { PyramidTenBoard } from './PyramidTenState';
import type { RowFold, UncoveredCard } from './Tableau';

// ── Selection ───────────────────────────────────────────────

/** Where a selected card was found. */
export type SelectionSource = 'discard-top' | 'discard-second' | 'tableau';

/** A card picked by a specifier, and where it was found. */
export interface Selection {
  readonly card: Card;
  readonly source: SelectionSource;
}

/**
 * Find the selectable card a specifier names: discard top, then the
 * card beneath it, then the exposed tableau cards.
 *
 * @throws CardUnavailableError if no pile offers the card.
 */
export function resolveSelection(
  board: PyramidTenBoard,
  specifier: CardSpecifier,
): Selection {
  const { suit, rank } = specifier;

  const fromDiscard = board.discardPile.select(suit, rank);
  if (fromDiscard !== undefined) {
    const slot = board.discardPile.locate(fromDiscard);
    return {
      card: fromDiscard,
      source: slot === 'second' ? 'discard-second' : 'discard-top',
    };
  }

  const fromTableau = board.tableau.select(suit, rank);
  if (fromTableau !== undefined) {
    return { card: fromTableau, source: 'tableau' };
  }

  throw new CardUnavailableError(specifier.input, cardName({ suit, rank }));
}

// ── Validation ──────────────────────────────────────────────

/** A validated removal: one King, or a pair adding up to ten. */
export interface RemovalPlan {
  readonly selections: readonly Selection[];
}

/**
 * Validate a removal request against the board.
 *
 * Checks, in order: the number of specifiers, that the first card is
 * available, the lone-King rules, that the second card is available,
 * that the two cards are distinct and add up to ten, and that a card
 * taken from under the discard top is paired with that top.
 *
 * @throws ActionError describing the first rule that fails.
 */
export function planRemoval(
  board: PyramidTenBoard,
  specifiers: readonly CardSpecifier[],
): RemovalPlan {
  if (specifiers.length === 0 || specifiers.length > 2) {
    throw new WrongSelectionCountError(specifiers.length);
  }

  const first = resolveSelection(board, specifiers[0]);

  if (specifiers.length === 1) {
    if (first.card.rank !== PAIR_TOTAL) {
      throw new WrongSelectionCountError(
        1,
        `Only a King can be removed alone; pair the ${cardName(first.card)} with a second card`,
      );
    }
    if (first.source === 'discard-second') {
      throw new BelowTopOfPileError(first.card);
    }
    return { selections: [first] };
  }

  const second = resolveSelection(board, specifiers[1]);

  if (first.card === second.card) {
    throw new InvalidPairError(first.card, second.card, 'cannot pair a card with itself');
  }
  if (!canPair(first.card, second.card)) {
    throw new InvalidPairError(first.card, second.card);
  }

  for (const [below, other] of [[first, second], [second, first]] as const) {
    if (below.source === 'discard-second' && other.source !== 'discard-top') {
      throw new BelowTopOfPileError(below.card);
    }
  }

  return { selections: [first, second] };
}

/**
 * Result of a legality check: either legal or illegal with a reason.
 */
export type LegalityResult =
  | { legal: true }
  | { legal: false; reason: string };

/**
 * Check a removal request without throwing.
 */
export function checkRemoval(
  board: PyramidTenBoard,
  specifiers: readonly CardSpecifier[],
): LegalityResult {
  try {
    planRemoval(board, specifiers);
    return { legal: true };
  } catch (err) {
    if (err instanceof ActionError) {
      return { legal: false, reason: err.message };
    }
    throw err;
  }
}

// ── Removal ─────────────────────────────────────────────────

/**
 * The places a selected card can be taken from, tried in this order.
 * The discard pile only accepts its top two cards, so a tableau card
 * always falls through to the tableau.
 */
export type RemovalSource = 'discard' | 'tableau';

export const REMOVAL_ORDER: readonly RemovalSource[] = ['discard', 'tableau'];

const NOTHING_UNCOVERED: readonly UncoveredCard[] = [];

/** Try to take `card` out of one source; `null` if it is not there. */
function removeFromSource(
  board: PyramidTenBoard,
  source: RemovalSource,
  card: Card,
): { uncovered: readonly UncoveredCard[]; folded: RowFold | null } | null {
  switch (source) {
    case 'discard':
      return board.discardPile.remove(card)
        ? { uncovered: NOTHING_UNCOVERED, folded: null }
        : null;
    case 'tableau':
      return board.tableau.contains(card) ? board.tableau.remove(card) : null;
  }
}

/** What applying a removal plan changed. */
export interface AppliedRemoval {
  /** Cards moved to the completed pile, in the order they were named. */
  readonly removed: readonly Card[];
  /** Tableau cards exposed by the removal. */
  readonly uncovered: readonly UncoveredCard[];
  /** Rows that folded away (at most one per removed tableau card). */
  readonly folds: readonly RowFold[];
}

/**
 * Move every card of a validated plan to the completed pile, face-down.
 *
 * @throws If a planned card is no longer in any source, which means the
 *         plan was built against a different board.
 */
export function applyRemoval(
  board: PyramidTenBoard,
  plan: RemovalPlan,
): AppliedRemoval {
  const uncovered: UncoveredCard[] = [];
  const folds: RowFold[] = [];

  for (const { card } of plan.selections) {
    let taken = false;
    for (const source of REMOVAL_ORDER) {
      const result = removeFromSource(board, source, card);
      if (result === null) continue;
      uncovered.push(...result.uncovered);
      if (result.folded) folds.push(result.folded);
      taken = true;
      break;
    }
    if (!taken) {
      throw new Error(`${cardName(card)} is not in play and cannot be removed`);
    }

    card.isCovered = true;
    board.completedPile.put(card);
  }

  return {
    removed: plan.selections.map((s) => s.card),
    uncovered,
    folds,
  };
}

// ── Legal actions ───────────────────────────────────────────

/**
 * Enumerate every legal action: each removable King, each legal pair,
 * and drawing while the draw pile has cards.
 *
 * Removals are listed before the draw.
 */
export function findLegalActions(board: PyramidTenBoard): PlayerAction[] {
  const candidates: Card[] = [];
  const top = board.discardPile.peek();
  const second = board.discardPile.peekSecond();
  if (top) candidates.push(top);
  if (second) candidates.push(second);
  candidates.push(...board.tableau.exposedCards());

  const toSpecifier = (card: Card): CardSpecifier => ({
    input: specifierFor(card),
    rank: card.rank,
    suit: card.suit,
  });

  const requests: CardSpecifier[][] = [];
  for (let i = 0; i < candidates.length; i++) {
    if (candidates[i].rank === PAIR_TOTAL) {
      requests.push([toSpecifier(candidates[i])]);
    }
    for (let j = i + 1; j < candidates.length; j++) {
      if (canPair(candidates[i], candidates[j])) {
        requests.push([toSpecifier(candidates[i]), toSpecifier(candidates[j])]);
      }
    }
  }

  const actions: PlayerAction[] = requests
    .filter((specifiers) => checkRemoval(board, specifiers).legal)
    .map((specifiers): PlayerAction => ({ kind: 'pair', specifiers }));

  if (!board.drawPile.isEmpty()) {
    actions.push({ kind: 'draw' });
  }
  return actions;
}
