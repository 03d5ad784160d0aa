// src/core/config/index.ts
// Configuration system exports

export {
  type ShadowPolicy,
  type DispatchConfig,
  type LogConfig,
  type ModelConfig,
  type ConfigOverrides,
  type ConfigValidation,
  DEFAULT_DISPATCH_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
