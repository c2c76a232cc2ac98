// src/config/index.ts
// Configuration system exports

export {
  type SchemaConfig,
  type ErrorsConfig,
  type OutputConfig,
  type LogConfig,
  type TlgenConfig,
  type TlgenConfigInput,
  type ConfigValidation,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
