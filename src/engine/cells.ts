import { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function formatPos(pos: Pos): string {
  return `(${pos.row},${pos.col})`;
}

// Row-major order
export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function samePos(a: Pos, b: Pos): boolean {
  return a.row === b.row && a.col === b.col;
}

export interface ReadonlyCellSet extends Iterable<Pos> {
  readonly size: number;
  has(pos: Pos): boolean;
  values(): Pos[];
  isSubsetOf(other: ReadonlyCellSet): boolean;
  equals(other: ReadonlyCellSet): boolean;
  difference(other: ReadonlyCellSet): CellSet;
}

/**
 * Set of cells keyed by coordinate value rather than object identity.
 * Iterates in row-major order.
 */
export class CellSet implements ReadonlyCellSet {
  private readonly byKey = new Map<string, Pos>();
  private sorted: Pos[] | null = null;

  constructor(cells: Iterable<Pos> = []) {
    for (const c of cells) this.add(c);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(pos: Pos): boolean {
    return this.byKey.has(posKey(pos));
  }

  add(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.byKey.has(key)) return false;
    this.byKey.set(key, { row: pos.row, col: pos.col });
    this.sorted = null;
    return true;
  }

  values(): Pos[] {
    if (!this.sorted) {
      this.sorted = Array.from(this.byKey.values()).sort(comparePos);
    }
    return this.sorted.map((p) => ({ ...p }));
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.values()[Symbol.iterator]();
  }

  isSubsetOf(other: ReadonlyCellSet): boolean {
    if (this.size > other.size) return false;
    for (const p of this.byKey.values()) {
      if (!other.has(p)) return false;
    }
    return true;
  }

  equals(other: ReadonlyCellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  difference(other: ReadonlyCellSet): CellSet {
    const out = new CellSet();
    for (const p of this.byKey.values()) {
      if (!other.has(p)) out.add(p);
    }
    return out;
  }
}
