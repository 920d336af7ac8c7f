/**
 * Configuration barrel export
 */

export {
  loadConfig,
  loadConfigFile,
  loadScriptloomConfig,
  applyAgentOverrides,
  toPermissionPolicy,
} from "./config-loader.js";
export type {
  ConfigFile,
  ILoadConfigOptions,
  ILoadedConfig,
  IAgentOverrides,
} from "./config-loader.js";
export {
  validateProviderConfig,
  resolveProviderConfig,
  findApiKey,
} from "./provider-config.js";
