// src/core/config/index.ts
// Configuration system exports

export {
  type LogConfig,
  type CompilerConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  logLevelOf,
} from "./config";
