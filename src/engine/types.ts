export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
  safeFirstClick: boolean;
}

export interface Cell {
  mine: boolean;
  opened: boolean;
  flagged: boolean;
  hint: number; // number of mines among the 8 neighbours
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

// Read-only cell snapshot for rendering
export interface CellView {
  row: number;
  col: number;
  opened: boolean;
  flagged: boolean;
  hint: number | null;   // visible once opened
  mine: boolean | null;  // visible once the game is over
  exploded: boolean;     // the cell that lost the game
}

export interface Pos {
  row: number;
  col: number;
}

/** Default config: 8×8 with 8 mines */
export const DEFAULT_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
  safeFirstClick: false,
};

export type PresetName = "beginner" | "intermediate" | "expert";

export const PRESETS: Record<PresetName, Pick<GameConfig, "rows" | "cols" | "minesTotal">> = {
  beginner: { rows: 8, cols: 8, minesTotal: 8 },
  intermediate: { rows: 16, cols: 16, minesTotal: 40 },
  expert: { rows: 16, cols: 30, minesTotal: 99 },
};
