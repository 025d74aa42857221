import { MoveRecord, PlayResult, formatPos } from "../engine/index";

export function formatMove(move: MoveRecord): string {
  const kind = move.guessed ? "guess" : "safe ";
  const at = `${kind} ${formatPos(move.pos)}`;
  if (move.hint === null || move.report === null) return `${at} -> mine`;

  const { newSafes, newMines, derivedConstraints } = move.report;
  const parts = [`${at} -> ${move.hint}`];
  if (newSafes.length > 0) parts.push(`safe ${newSafes.map(formatPos).join(" ")}`);
  if (newMines.length > 0) parts.push(`mines ${newMines.map(formatPos).join(" ")}`);
  if (derivedConstraints > 0) parts.push(`${derivedConstraints} derived`);
  return parts.join(" | ");
}

export function summarize(results: PlayResult[]): string {
  const won = results.filter((r) => r.outcome === "won").length;
  const lost = results.filter((r) => r.outcome === "lost").length;
  const stuck = results.length - won - lost;
  const guesses = results.reduce((sum, r) => sum + r.guesses, 0);
  const rate = ((won / results.length) * 100).toFixed(1);
  return [
    `Games: ${results.length}`,
    `Won: ${won} (${rate}%)`,
    `Lost: ${lost}`,
    `Unfinished: ${stuck}`,
    `Guesses per game: ${(guesses / results.length).toFixed(2)}`,
  ].join("\n");
}
