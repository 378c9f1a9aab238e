// ============================================
// Config Module Barrel Export
// ============================================

export {
  type ConfigError,
  type ConfigErrorCode,
  configCandidates,
  DEFAULT_CONFIG_FILE,
  defaultConfigPath,
  defaultConfigText,
  findConfigFile,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  parseConfig,
  readConfigFile,
} from "./loader.js";
export { type Config, CommandRuleSchema, ConfigSchema } from "./schema.js";
