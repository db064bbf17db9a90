/**
 * @quarry/config - Type Definitions
 *
 * @packageDocumentation
 */

import type { LogLevel } from '@quarry/core';
import type { LockFailureMode } from '@quarry/locks';

export type LogFormat = 'json' | 'pretty';

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
}

export interface QueryConfig {
  /** Log a warning for passes at least this slow; 0 disables */
  readonly slowQueryThresholdMs: number;
  /** Abort joins that would emit more rows; 0 = unlimited */
  readonly maxJoinRows: number;
}

export interface LocksConfig {
  readonly failureMode: LockFailureMode;
}

export interface QuarryConfig {
  readonly logging: LoggingConfig;
  readonly query: QueryConfig;
  readonly locks: LocksConfig;
}

/**
 * Recursively optional version of a type.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
  suggestion?: string;
}

export interface ConfigValidationWarning {
  path: string;
  message: string;
  value?: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

export interface EnvConfigOptions {
  /** Variable prefix (default: 'QUARRY') */
  prefix?: string;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}
