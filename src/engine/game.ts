import {
  Cell,
  CellView,
  GameConfig,
  GameStatus,
  Pos,
  DEFAULT_CONFIG,
} from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  renderMines,
  renderView,
} from "./board";
import { CellSet, ReadonlyCellSet } from "./cells";
import { ConfigurationError } from "./errors";

export class Game {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private firstClick = true;
  private mines = new CellSet();
  private flags = new CellSet();

  constructor(config: Partial<GameConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    validateConfig(this.config);
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.grid = createEmptyGrid(this.rows, this.cols);

    if (!this.config.safeFirstClick) {
      this.initBoard([]);
    }
  }

  // Lazily called on first click when safeFirstClick is on
  private initBoard(excludePositions: Pos[]): void {
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.mines = new CellSet(placeMines(this.grid, this.config, excludePositions));
    computeHints(this.grid, this.rows, this.cols);
  }

  /** Replace the random layout with explicit mine positions (scripted games and tests). */
  setMines(positions: Pos[]): void {
    for (const p of positions) {
      if (!this.inBounds(p.row, p.col)) {
        throw new ConfigurationError(`Mine (${p.row}, ${p.col}) is outside the ${this.rows}x${this.cols} grid.`);
      }
    }
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.mines = new CellSet(positions);
    for (const p of this.mines) this.grid[p.row][p.col].mine = true;
    computeHints(this.grid, this.rows, this.cols);
    this.flags = new CellSet();
    this.firstClick = false;
    this.status = GameStatus.Playing;
    this.explodedPos = null;
  }

  inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  cell(row: number, col: number): Cell {
    return this.grid[row][col];
  }

  get mineCount(): number {
    return this.mines.size;
  }

  get minePositions(): ReadonlyCellSet {
    return this.mines;
  }

  get flaggedPositions(): ReadonlyCellSet {
    return this.flags;
  }

  isMine(row: number, col: number): boolean {
    return this.grid[row][col].mine;
  }

  nearbyMines(row: number, col: number): number {
    return this.grid[row][col].hint;
  }

  cellView(row: number, col: number): CellView {
    const c = this.grid[row][col];
    const gameOver = this.status !== GameStatus.Playing;
    const exploded =
      this.explodedPos !== null &&
      this.explodedPos.row === row &&
      this.explodedPos.col === col;

    return {
      row,
      col,
      opened: c.opened,
      flagged: c.flagged,
      hint: c.opened && !c.mine ? c.hint : null,
      mine: gameOver ? c.mine : null,
      exploded,
    };
  }

  /**
   * Reveal a single cell. Returns its neighbouring mine count, or null when the
   * move is ignored (game over, out of bounds, flagged) or hits a mine.
   */
  open(row: number, col: number): number | null {
    if (this.status !== GameStatus.Playing) return null;
    if (!this.inBounds(row, col)) return null;

    if (this.firstClick && this.config.safeFirstClick) {
      const exclude = [
        { row, col },
        ...neighbours(row, col, this.rows, this.cols),
      ];
      this.initBoard(exclude);
    }
    this.firstClick = false;

    const cell = this.grid[row][col];
    if (cell.flagged) return null;
    cell.opened = true;

    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row, col };
      return null;
    }
    this.checkWin();
    return cell.hint;
  }

  flag(row: number, col: number): void {
    if (this.status !== GameStatus.Playing) return;
    if (!this.inBounds(row, col)) return;
    const cell = this.grid[row][col];
    if (cell.opened || cell.flagged) return;
    cell.flagged = true;
    this.flags.add({ row, col });
    this.checkWin();
  }

  /** True once the flagged cells are exactly the mines. */
  won(): boolean {
    return this.flags.equals(this.mines);
  }

  private checkWin(): void {
    if (this.won()) {
      this.status = GameStatus.Won;
    }
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        row.push(this.cellView(r, c));
      }
      out.push(row);
    }
    return out;
  }

  renderMines(): string {
    return renderMines(this.grid);
  }

  render(): string {
    return renderView(this.visibleCells());
  }
}

export function validateConfig(config: GameConfig): void {
  const { rows, cols, minesTotal } = config;
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
    throw new ConfigurationError(`Board must be at least 1x1, got ${rows}x${cols}.`);
  }
  if (!Number.isInteger(minesTotal) || minesTotal < 0) {
    throw new ConfigurationError(`Mine count must be a non-negative integer, got ${minesTotal}.`);
  }
  // Safe first click reserves the clicked cell and up to 8 neighbours.
  const reserved = config.safeFirstClick ? Math.min(rows * cols, 9) : 0;
  if (minesTotal > rows * cols - reserved) {
    throw new ConfigurationError(
      `${minesTotal} mines do not fit on a ${rows}x${cols} board${config.safeFirstClick ? " with a safe first click" : ""}.`,
    );
  }
  if (!Number.isFinite(config.seed)) {
    throw new ConfigurationError(`Seed must be a finite number, got ${config.seed}.`);
  }
}
