/**
 * @quarry/config - Configuration Validation
 *
 * @packageDocumentation
 */

import { FailureModeSchema, LogFormatSchema, LogLevelSchema } from './schema.js';
import type {
  ConfigValidationError,
  ConfigValidationWarning,
  QuarryConfig,
  ValidationResult,
} from './types.js';

/**
 * Validate a complete QuarryConfig. Configurations built in plain JavaScript
 * can carry values the types rule out, so enum fields are checked too.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   logger.error('invalid configuration', { errors: result.errors.length });
 * }
 * ```
 */
export function validateConfig(config: QuarryConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateLoggingConfig(config.logging, errors);
  validateQueryConfig(config, errors, warnings);
  validateLocksConfig(config.locks, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateLoggingConfig(logging: QuarryConfig['logging'], errors: ConfigValidationError[]): void {
  if (!LogLevelSchema.safeParse(logging.level).success) {
    errors.push({
      path: 'logging.level',
      message: 'Unknown log level',
      value: logging.level,
      suggestion: `Use one of: ${LogLevelSchema.options.join(', ')}`,
    });
  }

  if (!LogFormatSchema.safeParse(logging.format).success) {
    errors.push({
      path: 'logging.format',
      message: 'Unknown log format',
      value: logging.format,
      suggestion: `Use one of: ${LogFormatSchema.options.join(', ')}`,
    });
  }
}

function validateQueryConfig(
  config: QuarryConfig,
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  const { query } = config;

  if (!Number.isFinite(query.slowQueryThresholdMs) || query.slowQueryThresholdMs < 0) {
    errors.push({
      path: 'query.slowQueryThresholdMs',
      message: 'Slow query threshold must be a non-negative number',
      value: query.slowQueryThresholdMs,
      suggestion: 'Use 0 to disable slow query warnings',
    });
  }

  if (!Number.isSafeInteger(query.maxJoinRows) || query.maxJoinRows < 0) {
    errors.push({
      path: 'query.maxJoinRows',
      message: 'Max join rows must be a non-negative integer',
      value: query.maxJoinRows,
      suggestion: 'Use 0 for no limit',
    });
  }

  // Slow query entries are logged at warn
  if (query.slowQueryThresholdMs > 0 && config.logging.level === 'error') {
    warnings.push({
      path: 'query.slowQueryThresholdMs',
      message: 'Slow query warnings are filtered out at log level "error"',
      value: query.slowQueryThresholdMs,
      recommendation: 'Lower logging.level to "warn" or disable the threshold',
    });
  }
}

function validateLocksConfig(
  locks: QuarryConfig['locks'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!FailureModeSchema.safeParse(locks.failureMode).success) {
    errors.push({
      path: 'locks.failureMode',
      message: 'Unknown lock failure mode',
      value: locks.failureMode,
      suggestion: `Use one of: ${FailureModeSchema.options.join(', ')}`,
    });
    return;
  }

  if (locks.failureMode === 'skip') {
    warnings.push({
      path: 'locks.failureMode',
      message: 'Elements that cannot be locked are left out of query results',
      value: locks.failureMode,
      recommendation: 'Use "abort", or LockQuery.allSettled() to see every failure',
    });
  }
}
