/**
 * Configuration exports.
 */
export {
  ConfigSchema,
  DEFAULT_RATINGS,
  WEIGHT_SUM_TOLERANCE,
} from './schema.js';
export type {
  Config,
  ConfigInput,
  EngineConfig,
  FingerprintSettings,
  Weights,
  RatingBucket,
  LanguageSettings,
  NormalizeSettings,
  SegmentSettings,
} from './schema.js';
export {
  resolveEngineConfig,
  getDefaultConfig,
  mergeConfig,
  loadConfig,
  getConfigPath,
} from './loader.js';
