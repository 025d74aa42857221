import { parseArgs } from "node:util";
import {
  DEFAULT_CONFIG,
  Game,
  GameConfig,
  MinesweeperError,
  PRESETS,
  PlayResult,
  PresetName,
  createEngineFor,
  formatPos,
  playGame,
  validateConfig,
} from "../engine/index";
import { formatMove, summarize } from "./report";

const USAGE = `Usage: minesweeper-agent [options]

  --preset <name>   beginner | intermediate | expert
  --rows <n>        board height (default ${DEFAULT_CONFIG.rows})
  --cols <n>        board width (default ${DEFAULT_CONFIG.cols})
  --mines <n>       number of mines (default ${DEFAULT_CONFIG.minesTotal})
  --seed <n>        seed for the board and random fallback moves
  --games <n>       play several games and print a summary
  --safe-first      the first move never hits a mine
  --verbose         log every move and what it proved
  --help`;

export interface CliOptions {
  config: GameConfig;
  games: number;
  verbose: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions | "help" {
  const { values } = parseArgs({
    args: argv,
    options: {
      preset: { type: "string" },
      rows: { type: "string" },
      cols: { type: "string" },
      mines: { type: "string" },
      seed: { type: "string" },
      games: { type: "string" },
      "safe-first": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) return "help";

  let config: GameConfig = { ...DEFAULT_CONFIG, seed: Date.now() };
  if (values.preset !== undefined) {
    if (!isPreset(values.preset)) {
      throw new MinesweeperError(`Unknown preset "${values.preset}".`);
    }
    config = { ...config, ...PRESETS[values.preset] };
  }
  if (values.rows !== undefined) config.rows = parseInteger("rows", values.rows);
  if (values.cols !== undefined) config.cols = parseInteger("cols", values.cols);
  if (values.mines !== undefined) config.minesTotal = parseInteger("mines", values.mines);
  if (values.seed !== undefined) config.seed = parseInteger("seed", values.seed);
  config.safeFirstClick = values["safe-first"];

  const games = values.games !== undefined ? parseInteger("games", values.games) : 1;
  if (games < 1) throw new MinesweeperError("--games must be at least 1.");

  return { config, games, verbose: values.verbose };
}

function isPreset(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

function parseInteger(flag: string, raw: string): number {
  // Number("") and Number(" ") are both 0
  const n = raw.trim() === "" ? NaN : Number(raw);
  if (!Number.isInteger(n)) {
    throw new MinesweeperError(`--${flag} expects an integer, got "${raw}".`);
  }
  return n;
}

export function run(argv: string[]): number {
  let options: CliOptions | "help";
  try {
    options = parseCliArgs(argv);
    if (options !== "help") validateConfig(options.config);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 1;
  }
  if (options === "help") {
    console.log(USAGE);
    return 0;
  }

  const results: PlayResult[] = [];
  for (let i = 0; i < options.games; i++) {
    const config = { ...options.config, seed: options.config.seed + i };
    const game = new Game(config);
    const engine = createEngineFor(game);

    console.log(`## Game ${i + 1} (seed ${config.seed}, ${config.rows}x${config.cols}, ${config.minesTotal} mines)`);
    const result = playGame(game, engine, {
      onMove: options.verbose ? (move) => console.log(formatMove(move)) : undefined,
    });
    results.push(result);

    console.log(game.render());
    const last = result.moves[result.moves.length - 1];
    const tail = result.outcome === "lost" && last ? ` at ${formatPos(last.pos)}` : "";
    console.log(`Outcome: ${result.outcome}${tail} after ${result.moves.length} moves (${result.guesses} guesses)\n`);
  }

  if (options.games > 1) console.log(summarize(results));
  return 0;
}
