import { CellSet, ReadonlyCellSet, formatPos } from "./cells";
import { InvariantViolationError } from "./errors";
import { Pos } from "./types";

/**
 * Logical statement about the board: exactly `count` of `cells` are mines.
 *
 * Constraints are values. The engine never edits one in place; when a cell's
 * status becomes known it swaps the constraint for a re-created copy.
 */
export class Constraint {
  readonly cells: ReadonlyCellSet;
  readonly count: number;

  constructor(cells: Iterable<Pos>, count: number) {
    const set = new CellSet(cells);
    if (!Number.isInteger(count) || count < 0 || count > set.size) {
      throw new InvariantViolationError(
        `Constraint count ${count} is outside [0, ${set.size}] for ${describeCells(set)}.`,
      );
    }
    this.cells = set;
    this.count = count;
  }

  get size(): number {
    return this.cells.size;
  }

  isEmpty(): boolean {
    return this.cells.size === 0;
  }

  /** Every cell, when the count says they are all mines. */
  knownMines(): Pos[] {
    if (this.cells.size > 0 && this.cells.size === this.count) return this.cells.values();
    return [];
  }

  /** Every cell, when the count is zero. */
  knownSafes(): Pos[] {
    if (this.count === 0) return this.cells.values();
    return [];
  }

  equals(other: Constraint): boolean {
    return this.count === other.count && this.cells.equals(other.cells);
  }

  isSubsetOf(other: Constraint): boolean {
    return this.cells.isSubsetOf(other.cells);
  }

  // If `subset` covers part of this constraint, the remaining cells hold the remaining mines.
  subtract(subset: Constraint): Constraint {
    return new Constraint(this.cells.difference(subset.cells), this.count - subset.count);
  }

  withSafe(pos: Pos): Constraint {
    if (!this.cells.has(pos)) return this;
    return new Constraint(this.cells.difference(new CellSet([pos])), this.count);
  }

  withMine(pos: Pos): Constraint {
    if (!this.cells.has(pos)) return this;
    return new Constraint(this.cells.difference(new CellSet([pos])), this.count - 1);
  }

  toString(): string {
    return `${describeCells(this.cells)} = ${this.count}`;
  }
}

function describeCells(cells: ReadonlyCellSet): string {
  return `{${cells.values().map(formatPos).join(", ")}}`;
}
