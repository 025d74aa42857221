export { Game, validateConfig } from "./game";
export {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  inGrid,
  allPositions,
  renderMines,
  renderView,
} from "./board";
export { createRng, shuffle, pickRandom } from "./rng";
export { CellSet, posKey, formatPos, comparePos, samePos } from "./cells";
export type { ReadonlyCellSet } from "./cells";
export type {
  GameConfig,
  Cell,
  CellView,
  Pos,
  PresetName,
} from "./types";
export { GameStatus, DEFAULT_CONFIG, PRESETS } from "./types";
export { Constraint } from "./constraint";
export { InferenceEngine } from "./inference";
export type { InferenceEngineOptions, InferenceReport } from "./inference";
export { playTurn, playGame, createEngineFor } from "./autoplay";
export type { MoveRecord, PlayOptions, PlayOutcome, PlayResult } from "./autoplay";
export {
  MinesweeperError,
  InvariantViolationError,
  ObservationError,
  ConfigurationError,
} from "./errors";
