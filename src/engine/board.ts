import { Cell, CellView, GameConfig, Pos } from "./types";
import { createRng, shuffle } from "./rng";
import { posKey } from "./cells";

// 8-connected neighbourhood clipped to the grid
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function inGrid(pos: Pos, rows: number, cols: number): boolean {
  return (
    Number.isInteger(pos.row) &&
    Number.isInteger(pos.col) &&
    pos.row >= 0 &&
    pos.row < rows &&
    pos.col >= 0 &&
    pos.col < cols
  );
}

export function allPositions(rows: number, cols: number): Pos[] {
  const out: Pos[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) out.push({ row: r, col: c });
  }
  return out;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, opened: false, flagged: false, hint: 0 });
    }
    grid.push(row);
  }
  return grid;
}

// Uniform placement: shuffle the eligible cells with the seeded rng and take the first N.
// Returns the mine positions in row-major order.
export function placeMines(
  grid: Cell[][],
  config: GameConfig,
  excludePositions: Pos[] = [],
): Pos[] {
  const { rows, cols, minesTotal, seed } = config;
  const rng = createRng(seed);
  const excludeSet = new Set(excludePositions.map((p) => posKey(p)));

  const eligible = allPositions(rows, cols).filter((p) => !excludeSet.has(posKey(p)));
  const chosen = shuffle(eligible, rng).slice(0, minesTotal);
  for (const p of chosen) grid[p.row][p.col].mine = true;

  return chosen.sort((a, b) => a.row - b.row || a.col - b.col);
}

// hint = number of neighbouring mines
export function computeHints(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let count = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) count++;
      }
      grid[r][c].hint = count;
    }
  }
}

// Mine layout, one "|X" or "| " per cell between horizontal rules
export function renderMines(grid: Cell[][]): string {
  const lines: string[] = [];
  for (const row of grid) {
    const rule = "--".repeat(row.length) + "-";
    lines.push(rule);
    lines.push(row.map((c) => (c.mine ? "|X" : "| ")).join("") + "|");
  }
  const width = grid.length > 0 ? grid[0].length : 0;
  lines.push("--".repeat(width) + "-");
  return lines.join("\n");
}

// Player's view: "." hidden, "F" flagged, digit for an opened cell,
// "*" mine and "!" the exploded mine once the game is over.
export function renderView(cells: CellView[][]): string {
  return cells
    .map((row) =>
      row
        .map((v) => {
          if (v.exploded) return "!";
          if (v.opened) return v.hint === null ? "?" : String(v.hint);
          if (v.flagged) return "F";
          if (v.mine) return "*";
          return ".";
        })
        .join(" "),
    )
    .join("\n");
}
