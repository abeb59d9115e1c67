// src/core/config/index.ts
// Configuration system exports

export {
  type ExplorationConfig,
  type TraceConfig,
  type PromisingConfig,
  type ConfigValidation,
  DEFAULT_EXPLORATION_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromObject,
  mergeConfigs,
  exploreOptionsFromConfig,
  validateConfig,
} from "./config";
