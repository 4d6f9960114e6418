import { ConfigData, DEFAULTS, ENV_MAP, CONFIG_KEYS, parseConfigValue } from "./defaults";
import { ConfigFileData, getConfigPath, readConfigFile } from "./configFile";

const cliOverrides: ConfigFileData = {};

export function setCliOverride(key: keyof ConfigData, value: string): void {
  cliOverrides[key] = value;
}

function assign<K extends keyof ConfigData>(
  target: ConfigData,
  key: K,
  raw: string,
  source: string,
): void {
  target[key] = parseConfigValue(key, raw, source);
}

/**
 * Layer the config sources: defaults, then the config file, then the
 * environment, then command-line flags. Empty strings fall through.
 */
export async function resolveConfig(
  overrides: ConfigFileData = cliOverrides,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConfigData> {
  const fileConfig = await readConfigFile();
  const resolved: ConfigData = { ...DEFAULTS };

  for (const key of CONFIG_KEYS) {
    const fileVal = fileConfig[key];
    if (fileVal !== undefined && fileVal !== "") {
      assign(resolved, key, fileVal, getConfigPath());
    }

    const envVal = env[ENV_MAP[key]];
    if (envVal !== undefined && envVal !== "") {
      assign(resolved, key, envVal, `env: ${ENV_MAP[key]}`);
    }

    const cliVal = overrides[key];
    if (cliVal !== undefined && cliVal !== "") {
      assign(resolved, key, cliVal, "the command line");
    }
  }

  return resolved;
}

export function getSource(
  key: keyof ConfigData,
  fileData: ConfigFileData,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const envVal = env[ENV_MAP[key]];
  if (envVal !== undefined && envVal !== "") return `env: ${ENV_MAP[key]}`;
  if (fileData[key] !== undefined && fileData[key] !== "") return "config file";
  return "default";
}
