/**
 * @quarry/config
 *
 * Configuration for quarry engines: typed defaults, environment and JSON
 * loading, validation, and a context that hands each engine its options.
 *
 * @packageDocumentation
 */

export type {
  QuarryConfig,
  LoggingConfig,
  LogFormat,
  QueryConfig,
  LocksConfig,
  DeepPartial,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_QUERY_CONFIG,
  DEFAULT_LOCKS_CONFIG,
} from './defaults.js';

export { createConfig, mergeConfigs, getConfigFromEnv, parseConfigJSON } from './config.js';

export {
  PartialConfigSchema,
  LogLevelSchema,
  LogFormatSchema,
  FailureModeSchema,
  type PartialConfigInput,
} from './schema.js';

export { validateConfig } from './validation.js';

export {
  createQueryContext,
  type QueryContext,
  type QueryContextOverrides,
  type LockContextOptions,
  type LockJoinContextOptions,
} from './context.js';
