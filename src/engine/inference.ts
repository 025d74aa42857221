import { Pos } from "./types";
import { CellSet, ReadonlyCellSet, formatPos, samePos } from "./cells";
import { Constraint } from "./constraint";
import { allPositions, inGrid, neighbours } from "./board";
import { createRng, pickRandom } from "./rng";
import { InvariantViolationError, ObservationError } from "./errors";

export interface InferenceEngineOptions {
  rows: number;
  cols: number;
  // seeds chooseRandomMove; defaults to Date.now()
  seed?: number;
}

/** What a single observation taught the engine. */
export interface InferenceReport {
  newSafes: Pos[];
  newMines: Pos[];
  derivedConstraints: number;
  passes: number;
}

/**
 * Knowledge base for one game. Owns the sets of moves made, proven safe cells
 * and proven mines, plus the live constraints over the cells still unknown.
 *
 * A cell moves from unknown to safe or to mine exactly once; the engine throws
 * InvariantViolationError rather than let the two sets overlap.
 */
export class InferenceEngine {
  readonly rows: number;
  readonly cols: number;
  private readonly rng: () => number;
  private readonly moves = new CellSet();
  private readonly safes = new CellSet();
  private readonly mines = new CellSet();
  private knowledge: Constraint[] = [];

  // Facts proven since the last observation started
  private pendingSafes: Pos[] = [];
  private pendingMines: Pos[] = [];

  constructor(options: InferenceEngineOptions) {
    this.rows = options.rows;
    this.cols = options.cols;
    this.rng = createRng(options.seed ?? Date.now());
  }

  get movesMade(): Pos[] {
    return this.moves.values();
  }

  get knownSafes(): Pos[] {
    return this.safes.values();
  }

  get knownMines(): Pos[] {
    return this.mines.values();
  }

  get mineSet(): ReadonlyCellSet {
    return this.mines;
  }

  get constraints(): readonly Constraint[] {
    return [...this.knowledge];
  }

  hasMoved(pos: Pos): boolean {
    return this.moves.has(pos);
  }

  isKnownSafe(pos: Pos): boolean {
    return this.safes.has(pos);
  }

  isKnownMine(pos: Pos): boolean {
    return this.mines.has(pos);
  }

  markMine(pos: Pos): void {
    if (this.mines.has(pos)) return;
    if (this.safes.has(pos)) {
      throw new InvariantViolationError(`Cell ${formatPos(pos)} is already known to be safe; cannot mark it as a mine.`);
    }
    this.mines.add(pos);
    this.pendingMines.push({ row: pos.row, col: pos.col });
    this.knowledge = this.knowledge.map((c) => c.withMine(pos));
  }

  markSafe(pos: Pos): void {
    if (this.safes.has(pos)) return;
    if (this.mines.has(pos)) {
      throw new InvariantViolationError(`Cell ${formatPos(pos)} is already known to be a mine; cannot mark it as safe.`);
    }
    this.safes.add(pos);
    this.pendingSafes.push({ row: pos.row, col: pos.col });
    this.knowledge = this.knowledge.map((c) => c.withSafe(pos));
  }

  /**
   * Ingest a revealed cell and the number of mines around it, then propagate
   * until nothing new can be proven.
   */
  recordObservation(pos: Pos, adjacentMineCount: number): InferenceReport {
    const { unresolved, minesAround } = this.validateObservation(pos, adjacentMineCount);
    this.pendingSafes = [];
    this.pendingMines = [];

    this.moves.add(pos);
    this.markSafe(pos);
    if (unresolved.length > 0) {
      this.addConstraint(new Constraint(unresolved, adjacentMineCount - minesAround));
    }

    const { derived, passes } = this.propagate();
    this.pruneKnowledge();
    return {
      newSafes: this.pendingSafes.filter((p) => !samePos(p, pos)),
      newMines: this.pendingMines,
      derivedConstraints: derived,
      passes,
    };
  }

  /** A proven-safe cell that has not been played yet, in row-major order. */
  chooseSafeMove(): Pos | null {
    for (const p of this.safes) {
      if (!this.moves.has(p)) return p;
    }
    return null;
  }

  /** Uniformly chosen cell that is neither played nor a known mine. */
  chooseRandomMove(): Pos | null {
    const candidates = allPositions(this.rows, this.cols).filter(
      (p) => !this.moves.has(p) && !this.mines.has(p),
    );
    return pickRandom(candidates, this.rng);
  }

  // Rejects the observation before any state changes; returns the neighbours still unknown.
  private validateObservation(pos: Pos, count: number): { unresolved: Pos[]; minesAround: number } {
    if (!inGrid(pos, this.rows, this.cols)) {
      throw new ObservationError(`Cell ${formatPos(pos)} is outside the ${this.rows}x${this.cols} grid.`);
    }
    const around = neighbours(pos.row, pos.col, this.rows, this.cols);
    if (!Number.isInteger(count) || count < 0 || count > around.length) {
      throw new ObservationError(`Cell ${formatPos(pos)} cannot have ${count} neighbouring mines (0..${around.length}).`);
    }
    if (this.mines.has(pos)) {
      throw new InvariantViolationError(`Cell ${formatPos(pos)} was observed but is known to be a mine.`);
    }

    const unresolved: Pos[] = [];
    let minesAround = 0;
    for (const n of around) {
      if (this.mines.has(n)) minesAround++;
      else if (!this.safes.has(n)) unresolved.push(n);
    }
    const remaining = count - minesAround;
    if (remaining < 0 || remaining > unresolved.length) {
      throw new ObservationError(
        `Cell ${formatPos(pos)} reports ${count} mines but ${minesAround} are known and ${unresolved.length} neighbours are unresolved.`,
      );
    }
    return { unresolved, minesAround };
  }

  private addConstraint(constraint: Constraint): boolean {
    if (constraint.isEmpty()) return false;
    if (this.knowledge.some((c) => c.equals(constraint))) return false;
    this.knowledge.push(constraint);
    return true;
  }

  // Fixed point: each pass resolves trivially known cells, then derives B − A for every A ⊆ B.
  private propagate(): { derived: number; passes: number } {
    let derived = 0;
    let passes = 0;
    let changed = true;

    while (changed) {
      changed = false;
      passes++;

      const safes = new CellSet();
      const mines = new CellSet();
      for (const c of this.knowledge) {
        for (const p of c.knownSafes()) safes.add(p);
        for (const p of c.knownMines()) mines.add(p);
      }
      for (const p of safes) {
        if (!this.safes.has(p)) {
          this.markSafe(p);
          changed = true;
        }
      }
      for (const p of mines) {
        if (!this.mines.has(p)) {
          this.markMine(p);
          changed = true;
        }
      }

      this.pruneKnowledge();

      const inferred: Constraint[] = [];
      for (const a of this.knowledge) {
        for (const b of this.knowledge) {
          if (a === b || a.size >= b.size || !a.isSubsetOf(b)) continue;
          const candidate = b.subtract(a);
          if (candidate.isEmpty()) continue;
          if (this.knowledge.some((c) => c.equals(candidate))) continue;
          if (inferred.some((c) => c.equals(candidate))) continue;
          inferred.push(candidate);
        }
      }
      if (inferred.length > 0) {
        this.knowledge.push(...inferred);
        derived += inferred.length;
        changed = true;
      }
    }

    return { derived, passes };
  }

  // Drop resolved (empty) constraints and duplicates, keeping first occurrences.
  private pruneKnowledge(): void {
    const kept: Constraint[] = [];
    for (const c of this.knowledge) {
      if (c.isEmpty()) continue;
      if (kept.some((k) => k.equals(c))) continue;
      kept.push(c);
    }
    this.knowledge = kept;
  }
}
