export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  ENV_VARS,
  CONFIG_PATH_ENV_VAR,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveConfigPath } from "./paths.js";
