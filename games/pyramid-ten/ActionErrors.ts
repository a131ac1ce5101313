/**
 * Recoverable action errors for Pyramid Ten.
 *
 * Every rejected action throws one of these before the board is
 * touched. The turn boundary catches them, reports the message and
 * asks for another action; the game carries on.
 */

import type { Card } from '../../src/card-system/Card';
import { PAIR_TOTAL, cardName } from '../../src/card-system/Card';

/** Discriminator for the recoverable error kinds. */
export type ActionErrorKind =
  | 'InvalidRank'
  | 'MalformedSpecifier'
  | 'CardUnavailable'
  | 'WrongSelectionCount'
  | 'InvalidPair'
  | 'BelowTopOfPile';

/** Base class of every recoverable action error. */
export abstract class ActionError extends Error {
  abstract readonly kind: ActionErrorKind;
}

/** A numeric rank outside 1-10. */
export class InvalidRankSpecifierError extends ActionError {
  readonly kind = 'InvalidRank';

  constructor(readonly input: string, rank: number) {
    super(`Invalid card selection: a rank must be between 1 and 10, got "${input}" (rank ${rank}) instead`);
    this.name = 'InvalidRankSpecifierError';
  }
}

/** Input that does not read as `<rank><suit>`. */
export class MalformedSpecifierError extends ActionError {
  readonly kind = 'MalformedSpecifier';

  constructor(readonly input: string) {
    super(`Invalid card selection: could not identify a rank and suit in "${input}"`);
    this.name = 'MalformedSpecifierError';
  }
}

/** A well-formed specifier naming a card that cannot be selected. */
export class CardUnavailableError extends ActionError {
  readonly kind = 'CardUnavailable';

  constructor(readonly input: string, readonly wouldBe: string) {
    super(`The ${wouldBe} is not available, got "${input}"`);
    this.name = 'CardUnavailableError';
  }
}

/** Zero or more than two cards, or a lone card that is not a King. */
export class WrongSelectionCountError extends ActionError {
  readonly kind = 'WrongSelectionCount';

  constructor(readonly count: number, details?: string) {
    super(
      details ??
        `Select one King or two cards adding up to ${PAIR_TOTAL}, got ${count} cards`,
    );
    this.name = 'WrongSelectionCountError';
  }
}

/** Two cards that do not add up to ten, or one card named twice. */
export class InvalidPairError extends ActionError {
  readonly kind = 'InvalidPair';

  constructor(first: Card, second: Card, details?: string) {
    super(
      `Invalid pair attempt between ${cardName(first)} and ${cardName(second)}, ` +
        (details ?? `the ranks add up to ${first.rank + second.rank}, not ${PAIR_TOTAL}`),
    );
    this.name = 'InvalidPairError';
  }
}

/** The card under the discard top used without the top itself. */
export class BelowTopOfPileError extends ActionError {
  readonly kind = 'BelowTopOfPile';

  constructor(card: Card) {
    super(
      `The ${cardName(card)} is below the top of the discard pile; ` +
        'it can only be paired with the card on top of it',
    );
    this.name = 'BelowTopOfPileError';
  }
}
