// ─── Game loop tests ────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  Game,
  GameStatus,
  InferenceEngine,
  MoveRecord,
  PRESETS,
  createEngineFor,
  playGame,
  playTurn,
} from "../src/engine/index";

// 3×3 board with a single mine in the top-left corner; the agent starts
// from a bottom-right cell it already knows to be safe.
function cornerMineGame(): { game: Game; engine: InferenceEngine } {
  const game = new Game({ rows: 3, cols: 3, minesTotal: 0, seed: 1 });
  game.setMines([{ row: 0, col: 0 }]);
  const engine = createEngineFor(game);
  engine.markSafe({ row: 2, col: 2 });
  return { game, engine };
}

describe("playTurn", () => {
  it("plays a proven-safe cell before guessing", () => {
    const { game, engine } = cornerMineGame();
    const move = playTurn(game, engine);
    expect(move).not.toBeNull();
    expect(move?.pos).toEqual({ row: 2, col: 2 });
    expect(move?.guessed).toBe(false);
    expect(move?.hint).toBe(0);
    expect(move?.report?.newSafes).toEqual([
      { row: 1, col: 1 },
      { row: 1, col: 2 },
      { row: 2, col: 1 },
    ]);
  });

  it("guesses when nothing is proven safe", () => {
    const game = new Game({ rows: 2, cols: 2, minesTotal: 0, seed: 1 });
    const engine = createEngineFor(game);
    const move = playTurn(game, engine);
    expect(move?.guessed).toBe(true);
    expect(move?.hint).toBe(0);
    expect(game.status).toBe(GameStatus.Won);
  });

  it("reports a mine hit and stops", () => {
    const game = new Game({ rows: 2, cols: 2, minesTotal: 0, seed: 1 });
    game.setMines([{ row: 0, col: 0 }]);
    const engine = createEngineFor(game);
    // Deliberately wrong knowledge so the agent walks onto the mine
    engine.markSafe({ row: 0, col: 0 });

    const move = playTurn(game, engine);
    expect(move).toEqual({ pos: { row: 0, col: 0 }, guessed: false, hint: null, report: null });
    expect(game.status).toBe(GameStatus.Lost);
    expect(playTurn(game, engine)).toBeNull();
  });
});

describe("playGame", () => {
  it("solves the corner-mine board without guessing", () => {
    const { game, engine } = cornerMineGame();
    const result = playGame(game, engine);

    expect(result.outcome).toBe("won");
    expect(result.guesses).toBe(0);
    expect(result.flagged).toBe(1);
    expect(result.moves.map((m) => m.pos)).toEqual([
      { row: 2, col: 2 },
      { row: 1, col: 1 },
      { row: 1, col: 2 },
      { row: 0, col: 1 },
      { row: 0, col: 2 },
      { row: 2, col: 0 },
    ]);
    expect(engine.knownMines).toEqual([{ row: 0, col: 0 }]);
    expect(game.cell(0, 0).flagged).toBe(true);
    expect(game.status).toBe(GameStatus.Won);
  });

  it("calls onMove after every move", () => {
    const { game, engine } = cornerMineGame();
    const seen: MoveRecord[] = [];
    playGame(game, engine, { onMove: (move) => seen.push(move) });
    expect(seen).toHaveLength(6);
  });

  it("stops at the move limit", () => {
    const { game, engine } = cornerMineGame();
    const result = playGame(game, engine, { maxMoves: 2 });
    expect(result.outcome).toBe("move-limit");
    expect(result.moves).toHaveLength(2);
  });

  it("ends lost when a move hits a mine", () => {
    const game = new Game({ rows: 2, cols: 2, minesTotal: 0, seed: 1 });
    game.setMines([{ row: 0, col: 0 }]);
    const engine = createEngineFor(game);
    engine.markSafe({ row: 0, col: 0 });
    const result = playGame(game, engine);
    expect(result.outcome).toBe("lost");
    expect(result.moves).toHaveLength(1);
  });

  it("only ever proves sound facts on random beginner boards", () => {
    for (let seed = 1; seed <= 25; seed++) {
      const game = new Game({ ...PRESETS.beginner, seed, safeFirstClick: false });
      const engine = createEngineFor(game);
      const result = playGame(game, engine);

      expect(["won", "lost"]).toContain(result.outcome);
      for (const m of engine.knownMines) expect(game.isMine(m.row, m.col)).toBe(true);
      for (const s of engine.knownSafes) expect(game.isMine(s.row, s.col)).toBe(false);
      if (result.outcome === "won") {
        expect(game.flaggedPositions.equals(game.minePositions)).toBe(true);
        expect(engine.mineSet.equals(game.minePositions)).toBe(true);
      }
      for (const move of result.moves.slice(0, -1)) expect(move.hint).not.toBeNull();
    }
  });
});
