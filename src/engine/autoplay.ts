import { GameStatus, Pos } from "./types";
import { Game } from "./game";
import { InferenceEngine, InferenceReport } from "./inference";

export interface MoveRecord {
  pos: Pos;
  guessed: boolean;     // true when no proven-safe cell was available
  hint: number | null;  // null when the move hit a mine
  report: InferenceReport | null;
}

export type PlayOutcome = "won" | "lost" | "stuck" | "move-limit";

export interface PlayResult {
  outcome: PlayOutcome;
  moves: MoveRecord[];
  guesses: number;
  flagged: number;
}

export interface PlayOptions {
  maxMoves?: number;
  onMove?: (move: MoveRecord, game: Game, engine: InferenceEngine) => void;
}

export function createEngineFor(game: Game, seed?: number): InferenceEngine {
  return new InferenceEngine({
    rows: game.rows,
    cols: game.cols,
    seed: seed ?? game.config.seed,
  });
}

/**
 * One move: a proven-safe cell if there is one, otherwise a random unexplored
 * cell. Returns null when neither exists or the game is already over.
 */
export function playTurn(game: Game, engine: InferenceEngine): MoveRecord | null {
  if (game.status !== GameStatus.Playing) return null;

  let guessed = false;
  let pos = engine.chooseSafeMove();
  if (!pos) {
    pos = engine.chooseRandomMove();
    guessed = true;
  }
  if (!pos) return null;

  const hint = game.open(pos.row, pos.col);
  if (hint === null) {
    return { pos, guessed, hint: null, report: null };
  }

  const report = engine.recordObservation(pos, hint);
  for (const m of engine.knownMines) {
    game.flag(m.row, m.col);
  }
  return { pos, guessed, hint, report };
}

export function playGame(game: Game, engine: InferenceEngine, options: PlayOptions = {}): PlayResult {
  const maxMoves = options.maxMoves ?? game.rows * game.cols;
  const moves: MoveRecord[] = [];
  let outcome: PlayOutcome = "move-limit";

  while (moves.length < maxMoves) {
    if (game.status === GameStatus.Won) {
      outcome = "won";
      break;
    }
    if (game.status === GameStatus.Lost) {
      outcome = "lost";
      break;
    }

    const move = playTurn(game, engine);
    if (!move) {
      outcome = "stuck";
      break;
    }
    moves.push(move);
    options.onMove?.(move, game, engine);
  }

  if (outcome === "move-limit") {
    if (game.status === GameStatus.Won) outcome = "won";
    else if (game.status === GameStatus.Lost) outcome = "lost";
  }

  return {
    outcome,
    moves,
    guesses: moves.filter((m) => m.guessed).length,
    flagged: game.flaggedPositions.size,
  };
}
