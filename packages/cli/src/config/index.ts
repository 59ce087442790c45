export { ConfigSchema, ConfigDefaults, CONFIG_TEMPLATE, type RawConfig, type Config } from './schema.js';
export {
  API_KEY_ENV_VAR,
  PLACEHOLDER_API_KEY,
  ConfigError,
  getConfigPath,
  initConfigFile,
  loadConfig,
  loadConfigWithMeta,
  type ApiKeySource,
  type ConfigOverrides,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './loader.js';
