import type { LogLevelString } from "bunyan";
import { DEFAULT_GAMES, DEFAULT_SIMULATIONS } from "@ttt-mcts/engine";
import { DEFAULT_EXPLORATION_WEIGHT } from "@ttt-mcts/mcts";

export interface ConfigData {
  /** Games per self-play run */
  games: number;
  /** MCTS rollouts before every move */
  simulations: number;
  /** UCT exploration constant */
  explorationWeight: number;
  /** Probability of a forced random move (never recorded) */
  randomMoveRate: number;
  /** Dataset path, relative to the working directory */
  output: string;
  /** Seed for the random source; empty means a fresh seed per run */
  seed: string;
  logLevel: LogLevelString;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "games",
  "simulations",
  "explorationWeight",
  "randomMoveRate",
  "output",
  "seed",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  games: DEFAULT_GAMES,
  simulations: DEFAULT_SIMULATIONS,
  explorationWeight: DEFAULT_EXPLORATION_WEIGHT,
  randomMoveRate: 0,
  output: "dataset.json",
  seed: "",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  games: "SELFPLAY_GAMES",
  simulations: "SELFPLAY_SIMULATIONS",
  explorationWeight: "SELFPLAY_EXPLORATION",
  randomMoveRate: "SELFPLAY_RANDOM_RATE",
  output: "SELFPLAY_OUTPUT",
  seed: "SELFPLAY_SEED",
  logLevel: "LOG_LEVEL",
};

const LOG_LEVELS: readonly LogLevelString[] = ["trace", "debug", "info", "warn", "error", "fatal"];

interface ValueParser<T> {
  expected: string;
  parse(raw: string): T | null;
}

type ConfigParsers = { [K in keyof ConfigData]: ValueParser<ConfigData[K]> };

function integer(min: number): ValueParser<number> {
  return {
    expected: min > 0 ? "a positive integer" : "a non-negative integer",
    parse(raw) {
      if (!/^\d+$/.test(raw)) return null;
      const n = parseInt(raw, 10);
      return n >= min ? n : null;
    },
  };
}

function number(min: number, max: number): ValueParser<number> {
  return {
    expected: Number.isFinite(max) ? `a number between ${min} and ${max}` : `a number >= ${min}`,
    parse(raw) {
      if (raw.trim() === "") return null;
      const n = Number(raw);
      return Number.isFinite(n) && n >= min && n <= max ? n : null;
    },
  };
}

const text: ValueParser<string> = {
  expected: "a string",
  parse: (raw) => raw,
};

const PARSERS: ConfigParsers = {
  games: integer(0),
  simulations: integer(1),
  explorationWeight: number(0, Infinity),
  randomMoveRate: number(0, 1),
  output: {
    expected: "a file path",
    parse: (raw) => (raw.trim() === "" ? null : raw),
  },
  seed: text,
  logLevel: {
    expected: LOG_LEVELS.join(", "),
    parse: (raw) => LOG_LEVELS.find((level) => level === raw.trim().toLowerCase()) ?? null,
  },
};

/**
 * Convert a raw string from the config file, the environment or the command
 * line into the typed value for `key`. `source` names where it came from.
 */
export function parseConfigValue<K extends keyof ConfigData>(
  key: K,
  raw: string,
  source: string,
): ConfigData[K] {
  const parser: ValueParser<ConfigData[K]> = PARSERS[key];
  const value = parser.parse(raw);
  if (value === null) {
    throw new Error(
      `Invalid ${key} "${raw}" from ${source}: expected ${parser.expected}`,
    );
  }
  return value;
}

export function isConfigKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}
