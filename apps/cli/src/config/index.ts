export {
  CONFIG_KEYS,
  DEFAULTS,
  ENV_MAP,
  isConfigKey,
  parseConfigValue,
} from "./defaults";
export type { ConfigData } from "./defaults";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile";
export type { ConfigFileData } from "./configFile";
export { resolveConfig, setCliOverride, getSource } from "./resolve";
