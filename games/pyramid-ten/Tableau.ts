/**
 * Tableau -- the triangular arrangement of cards for Pyramid Ten.
 *
 * Normal rows are numbered from the apex: row `r` holds `r + 1` slots.
 * Below the triangle sits one terminal row with as many slots as there
 * are normal rows. With three rows the layout is:
 *
 *           [0,0]
 *        [1,0] [1,1]
 *     [2,0] [2,1] [2,2]
 *     [T0]  [T1]  [T2]
 *
 * Card `(r, c)` rests under `(r + 1, c)` and `(r + 1, c + 1)`. A card
 * of the bottom normal row rests under the single terminal card in the
 * same column. A card is exposed once every card resting on it is gone.
 *
 * Every card's address is fixed when it is dealt, so the coverage graph
 * does not depend on removal order.
 */

import type { Card, Rank, Suit } from '../../src/card-system/Card';
import { cardName } from '../../src/card-system/Card';
import type { Pile } from '../../src/card-system/Pile';

// ── Geometry ────────────────────────────────────────────────

/** Default number of normal rows. */
export const DEFAULT_ROW_COUNT = 6;

/** Address of a slot in one of the triangle's rows. */
export interface NormalAddress {
  readonly kind: 'normal';
  readonly row: number;
  readonly col: number;
}

/** Address of a slot in the terminal row. */
export interface TerminalAddress {
  readonly kind: 'terminal';
  readonly col: number;
}

export type SlotAddress = NormalAddress | TerminalAddress;

/** A row of the triangle; row `index` has `index + 1` slots. */
export interface NormalRow {
  readonly kind: 'normal';
  readonly index: number;
  readonly slots: ReadonlyArray<Card | null>;
}

/** The extra row below the triangle; each card covers exactly one. */
export interface TerminalRow {
  readonly kind: 'terminal';
  readonly slots: ReadonlyArray<Card | null>;
}

export type TableauRow = NormalRow | TerminalRow;

/** Number of cards dealt to a tableau with `rowCount` normal rows. */
export function tableauSize(rowCount: number): number {
  return ((rowCount + 1) * rowCount) / 2 + rowCount;
}

// ── Removal results ─────────────────────────────────────────

/** A card that became exposed, and where it sits. */
export interface UncoveredCard {
  readonly card: Card;
  readonly address: SlotAddress;
}

/** Describes the row that folded away after a removal. */
export interface RowFold {
  /** Whether the folded row was the terminal row. */
  readonly terminal: boolean;
  /** Number of normal rows left after the fold. */
  readonly rowCount: number;
}

export interface RemovalResult {
  readonly uncovered: readonly UncoveredCard[];
  readonly folded: RowFold | null;
}

function cardKey(suit: Suit, rank: Rank): string {
  return `${suit}:${rank}`;
}

// ── Tableau ─────────────────────────────────────────────────

interface MutableRow {
  readonly slots: Array<Card | null>;
}

export class Tableau {
  private readonly normalRows: MutableRow[] = [];
  private terminalRow: MutableRow | null;
  private readonly addresses = new Map<Card, SlotAddress>();
  private readonly byKey = new Map<string, Card>();

  /**
   * Lay out `cards` in row-major order, terminal row last.
   * Terminal cards start exposed; every other card starts covered.
   *
   * @throws If `rowCount` is not a positive integer or the number of
   *         cards does not match `tableauSize(rowCount)`.
   */
  constructor(cards: readonly Card[], rowCount: number = DEFAULT_ROW_COUNT) {
    if (!Number.isInteger(rowCount) || rowCount < 1) {
      throw new Error(`A tableau needs at least 1 row, got ${rowCount}`);
    }
    const expected = tableauSize(rowCount);
    if (cards.length !== expected) {
      throw new Error(
        `A tableau of ${rowCount} rows requires exactly ${expected} cards, got ${cards.length}`,
      );
    }

    let next = 0;
    for (let row = 0; row < rowCount; row++) {
      const slots = cards.slice(next, next + row + 1);
      slots.forEach((card, col) => this.place(card, { kind: 'normal', row, col }, true));
      this.normalRows.push({ slots });
      next += row + 1;
    }

    const terminal = cards.slice(next, next + rowCount);
    terminal.forEach((card, col) => this.place(card, { kind: 'terminal', col }, false));
    this.terminalRow = { slots: terminal };
  }

  /**
   * Deal a tableau from the top of the draw pile. The cards are
   * removed from the pile.
   *
   * @throws If the pile holds fewer than `tableauSize(rowCount)` cards.
   */
  static deal(drawPile: Pile, rowCount: number = DEFAULT_ROW_COUNT): Tableau {
    const needed = tableauSize(rowCount);
    if (drawPile.size() < needed) {
      throw new Error(
        `A tableau of ${rowCount} rows needs ${needed} cards, the draw pile has ${drawPile.size()}`,
      );
    }
    return new Tableau(drawPile.takeTop(needed), rowCount);
  }

  private place(card: Card, address: SlotAddress, isCovered: boolean): void {
    card.isCovered = isCovered;
    this.addresses.set(card, address);
    this.byKey.set(cardKey(card.suit, card.rank), card);
  }

  // ── Queries ───────────────────────────────────────────────

  /** Number of normal rows still on the table. */
  get rowCount(): number {
    return this.normalRows.length;
  }

  /** Whether the terminal row is still on the table. */
  get hasTerminalRow(): boolean {
    return this.terminalRow !== null;
  }

  /** Number of cards still in the tableau. */
  occupiedCount(): number {
    return this.addresses.size;
  }

  /** Whether every row, including the terminal row, has folded away. */
  isCleared(): boolean {
    return this.normalRows.length === 0 && this.terminalRow === null;
  }

  /** Whether this exact card instance is in the tableau. */
  contains(card: Card): boolean {
    return this.addresses.has(card);
  }

  /** Where a card sits, or `undefined` if it is not in the tableau. */
  addressOf(card: Card): SlotAddress | undefined {
    return this.addresses.get(card);
  }

  /**
   * Return the card with this suit and rank if it is in the tableau
   * and exposed. Covered and removed cards are never selectable.
   */
  select(suit: Suit, rank: Rank): Card | undefined {
    const card = this.byKey.get(cardKey(suit, rank));
    return card !== undefined && !card.isCovered ? card : undefined;
  }

  /** Snapshot of the normal rows, apex first. */
  rows(): NormalRow[] {
    return this.normalRows.map((row, index): NormalRow => ({
      kind: 'normal',
      index,
      slots: [...row.slots],
    }));
  }

  /** Snapshot of the terminal row, or `null` once it has folded. */
  terminal(): TerminalRow | null {
    return this.terminalRow
      ? { kind: 'terminal', slots: [...this.terminalRow.slots] }
      : null;
  }

  /** Every exposed card, in row-major order with the terminal row last. */
  exposedCards(): Card[] {
    const rows: MutableRow[] = this.terminalRow
      ? [...this.normalRows, this.terminalRow]
      : this.normalRows;
    return rows
      .flatMap((row) => row.slots)
      .filter((card): card is Card => card !== null && !card.isCovered);
  }

  // ── Coverage graph ────────────────────────────────────────

  private slotAt(address: SlotAddress): Card | null {
    switch (address.kind) {
      case 'normal':
        return this.normalRows[address.row]?.slots[address.col] ?? null;
      case 'terminal':
        return this.terminalRow?.slots[address.col] ?? null;
    }
  }

  private clearSlot(address: SlotAddress): void {
    switch (address.kind) {
      case 'normal':
        this.normalRows[address.row].slots[address.col] = null;
        break;
      case 'terminal':
        if (this.terminalRow) this.terminalRow.slots[address.col] = null;
        break;
    }
  }

  /** The slots resting on top of `address`. */
  private coverersOf(address: SlotAddress): SlotAddress[] {
    switch (address.kind) {
      case 'terminal':
        return [];
      case 'normal': {
        const below = address.row + 1;
        if (below < this.normalRows.length) {
          return [
            { kind: 'normal', row: below, col: address.col },
            { kind: 'normal', row: below, col: address.col + 1 },
          ];
        }
        return this.terminalRow ? [{ kind: 'terminal', col: address.col }] : [];
      }
    }
  }

  /** The slots that `address` rests on top of. */
  private dependentsOf(address: SlotAddress): SlotAddress[] {
    switch (address.kind) {
      case 'terminal':
        return [{ kind: 'normal', row: this.normalRows.length - 1, col: address.col }];
      case 'normal': {
        const { row, col } = address;
        const above: SlotAddress[] = [];
        if (row === 0) return above;
        if (col > 0) above.push({ kind: 'normal', row: row - 1, col: col - 1 });
        if (col < row) above.push({ kind: 'normal', row: row - 1, col });
        return above;
      }
    }
  }

  // ── Removal ───────────────────────────────────────────────

  /**
   * Remove an exposed card, expose every card it was the last coverer
   * of, and fold the bottom row away if it is now empty.
   *
   * @throws If the card is not in the tableau or is still covered.
   */
  remove(card: Card): RemovalResult {
    const address = this.addresses.get(card);
    if (address === undefined) {
      throw new Error(`${cardName(card)} is not in the tableau`);
    }
    if (card.isCovered) {
      throw new Error(`${cardName(card)} is covered and cannot be removed`);
    }

    this.clearSlot(address);
    this.addresses.delete(card);
    this.byKey.delete(cardKey(card.suit, card.rank));

    const uncovered: UncoveredCard[] = [];
    for (const dependent of this.dependentsOf(address)) {
      const below = this.slotAt(dependent);
      if (below === null || !below.isCovered) continue;
      if (this.coverersOf(dependent).every((c) => this.slotAt(c) === null)) {
        below.isCovered = false;
        uncovered.push({ card: below, address: dependent });
      }
    }

    return { uncovered, folded: this.foldBottomRow() };
  }

  /**
   * Fold away the bottom row if it is empty. The terminal row folds
   * first; after that each fold drops one normal row.
   */
  private foldBottomRow(): RowFold | null {
    if (this.terminalRow) {
      if (this.terminalRow.slots.some((slot) => slot !== null)) return null;
      this.terminalRow = null;
      return { terminal: true, rowCount: this.normalRows.length };
    }

    const bottom = this.normalRows[this.normalRows.length - 1];
    if (bottom === undefined || bottom.slots.some((slot) => slot !== null)) {
      return null;
    }
    this.normalRows.pop();
    return { terminal: false, rowCount: this.normalRows.length };
  }
}
