export { ConfigLoader, DEFAULT_CONFIG_FILENAME, deepMerge, readEnvOverrides, type LoadOptions } from './ConfigLoader.js';
export { ConfigValidator, formatValidationErrors } from './ConfigValidator.js';
export { DEFAULT_HARVEST_CONFIG, DEFAULT_USER_AGENT, getDefaultConfig } from './defaults.js';

export type {
  HarvestConfig,
  BrowserConfig,
  PacingConfig,
  ScrollConfig,
  RetryConfig,
  WindowConfig,
  LabelConfig,
  SortOrder,
  BackoffMode,
  ShardStrategy,
  DeepPartial,
  ConfigLoaderOptions,
  ValidationResult,
} from './types.js';

export * from './schemas/index.js';
