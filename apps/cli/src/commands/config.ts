import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  getConfigPath,
  getSource,
  isConfigKey,
  CONFIG_KEYS,
} from "../config";
import { reportError } from "./reportError";

function rejectUnknownKey(key: string): never {
  console.error(
    `Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`,
  );
  process.exit(1);
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage CLI configuration (~/.ttt-mcts/config.json)");

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      if (!isConfigKey(key)) rejectUnknownKey(key);
      try {
        await updateConfigFile(key, value);
        console.log(`Set ${key} = ${value}`);
      } catch (err: unknown) {
        reportError(err);
      }
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      if (!isConfigKey(key)) rejectUnknownKey(key);
      try {
        const resolved = await resolveConfig();
        console.log(String(resolved[key]));
      } catch (err: unknown) {
        reportError(err);
      }
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      try {
        await printConfigList();
      } catch (err: unknown) {
        reportError(err);
      }
    });
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    const value = resolved[key] === "" ? "(not set)" : String(resolved[key]);
    console.log(`  ${key}: ${value}  (${getSource(key, fileData)})`);
  }
  console.log("");
}
