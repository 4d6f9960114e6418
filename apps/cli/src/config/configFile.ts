import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, CONFIG_KEYS, parseConfigValue } from "./defaults";

/** Raw values as stored on disk; parsed into `ConfigData` on resolve. */
export type ConfigFileData = Partial<Record<keyof ConfigData, string>>;

export function getConfigDir(): string {
  return process.env.TTT_MCTS_HOME || join(homedir(), ".ttt-mcts");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readConfigFile(): Promise<ConfigFileData> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (isNotFound(err)) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) {
      console.error(
        `Warning: ${path} is malformed and was ignored. ` +
          `Run "ttt-mcts config set" to recreate it.`,
      );
      return {};
    }
    throw err;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const data: ConfigFileData = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "string" || typeof value === "number") {
      data[key] = String(value);
    }
  }
  return data;
}

export async function writeConfigFile(data: ConfigFileData): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<ConfigFileData> {
  // Refuse to store anything resolveConfig would reject later.
  parseConfigValue(key, value, "the command line");
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
