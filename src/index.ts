export { correctModel, ModelCorrector } from "./model-corrector.js";
export type { ModelCorrectorOptions, ModelLookup } from "./model-corrector.js";
export {
  BUILTIN_CATALOG,
  CatalogValidationError,
  ModelCatalog,
  parseCatalog,
} from "./catalog.js";
export {
  catalogFromConfig,
  ConfigError,
  createCorrectorFromConfig,
  defaultConfig,
  loadConfig,
} from "./config.js";
export type { CorrectorConfig } from "./config.js";
export {
  commonPrefixLength,
  DEFAULT_MIN_PREFIX_SCORE,
  findClosestModel,
} from "./utils/model-resolver.js";
export type { ModelMatch } from "./utils/model-resolver.js";
export { DEFAULT_LOG_LEVEL, isLogLevel, LEVEL_PRIORITY, Logger } from "./logger.js";
export type { LogFields, LogLevel } from "./logger.js";
