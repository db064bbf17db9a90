/**
 * @quarry/config - Defaults
 */

import type { LocksConfig, LoggingConfig, QuarryConfig, QueryConfig } from './types.js';

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = Object.freeze({
  level: 'info',
  format: 'json',
});

export const DEFAULT_QUERY_CONFIG: QueryConfig = Object.freeze({
  slowQueryThresholdMs: 0,
  maxJoinRows: 0,
});

export const DEFAULT_LOCKS_CONFIG: LocksConfig = Object.freeze({
  failureMode: 'abort',
});

export const DEFAULT_CONFIG: QuarryConfig = Object.freeze({
  logging: DEFAULT_LOGGING_CONFIG,
  query: DEFAULT_QUERY_CONFIG,
  locks: DEFAULT_LOCKS_CONFIG,
});
