import { fileURLToPath } from "node:url";
import { BattleEngine } from "./battleEngine.js";
import { CharacterDataError, loadRosterFromFile } from "./characterData.js";
import { InputClosedError } from "./console.js";
import { createHumanController, createRandomController } from "./controllers.js";
import { formatEvent } from "./narration.js";
import { createRng } from "./seedRng.js";
import { selectCharacters } from "./selection.js";
import type { BattleConfig, BattleResult, Output, Prompt } from "./types.js";

export const DEFAULT_ROSTER = fileURLToPath(new URL("../data/characters.json", import.meta.url));

export const USAGE = [
  "Usage: duel [options] [file]",
  "",
  "A text-based fighting game.",
  "",
  "Options:",
  "  -f, --file <path>      Character roster (.json, .yaml, .yml)",
  "  -s, --seed <seed>      Seed the computer's choices for a repeatable battle",
  "  -t, --max-turns <n>    End the battle after n turns",
  "  -h, --help             Show this help",
].join("\n");

const FLAGS = new Set(["-h", "--help", "-f", "--file", "-s", "--seed", "-t", "--max-turns"]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  file: string;
  config: BattleConfig;
  help: boolean;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { file: DEFAULT_ROSTER, config: {}, help: false };
  let fileSet = false;

  const valueFor = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || FLAGS.has(value)) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  const setFile = (file: string): void => {
    if (fileSet) throw new UsageError("Only one character file may be given");
    options.file = file;
    fileSet = true;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        options.help = true;
        break;
      case "-f":
      case "--file":
        setFile(valueFor(arg, i));
        i++;
        break;
      case "-s":
      case "--seed":
        options.config.seed = valueFor(arg, i);
        i++;
        break;
      case "-t":
      case "--max-turns": {
        const raw = valueFor(arg, i);
        const maxTurns = Number(raw);
        if (!Number.isInteger(maxTurns) || maxTurns <= 0) {
          throw new UsageError(`--max-turns must be a positive integer, got "${raw}"`);
        }
        options.config.maxTurns = maxTurns;
        i++;
        break;
      }
      default:
        if (arg.startsWith("-")) throw new UsageError(`Unknown option: ${arg}`);
        setFile(arg);
    }
  }

  return options;
}

export interface CliIo {
  prompt: Prompt;
  out: Output;
  err: Output;
}

export async function playGame(options: CliOptions, io: CliIo): Promise<BattleResult> {
  const roster = loadRosterFromFile(options.file);
  const rng = createRng(options.config.seed);
  const { player, opponent } = await selectCharacters(roster, io.prompt, rng, io.out);

  const engine = new BattleEngine(player, opponent, {
    config: options.config,
    controllers: {
      player: createHumanController(io.prompt, io.out),
      opponent: createRandomController(rng),
    },
    onEvent: (event) => {
      for (const line of formatEvent(event)) io.out(line);
    },
  });

  return engine.runBattle();
}

/** Runs the game and returns the process exit code. */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      io.err(`Error: ${err.message}`);
      io.err(USAGE);
      return 2;
    }
    throw err;
  }

  if (options.help) {
    io.out(USAGE);
    return 0;
  }

  try {
    await playGame(options, io);
    return 0;
  } catch (err) {
    if (err instanceof CharacterDataError) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    if (err instanceof InputClosedError) {
      io.err("Input closed. Battle abandoned.");
      return 1;
    }
    throw err;
  }
}
