/**
 * @quarry/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and read configurations.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { ErrorCode, ValidationError, toError } from '@quarry/core';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  EnvMillisecondsSchema,
  PartialConfigSchema,
  EnvRowCountSchema,
  FailureModeSchema,
  LogFormatSchema,
  LogLevelSchema,
} from './schema.js';
import type { DeepPartial, EnvConfigOptions, QuarryConfig } from './types.js';

function freezeConfig(config: QuarryConfig): QuarryConfig {
  return Object.freeze({
    logging: Object.freeze({ ...config.logging }),
    query: Object.freeze({ ...config.query }),
    locks: Object.freeze({ ...config.locks }),
  });
}

/**
 * Create a complete, frozen QuarryConfig. Fields missing (or undefined) in
 * `overrides` come from `base`.
 *
 * @example
 * ```typescript
 * const config = createConfig({ query: { slowQueryThresholdMs: 50 } });
 *
 * // Build on another config
 * const verbose = createConfig({ logging: { level: 'debug' } }, config);
 * ```
 */
export function createConfig(
  overrides: DeepPartial<QuarryConfig> = {},
  base: QuarryConfig = DEFAULT_CONFIG
): QuarryConfig {
  return freezeConfig({
    logging: {
      level: overrides.logging?.level ?? base.logging.level,
      format: overrides.logging?.format ?? base.logging.format,
    },
    query: {
      slowQueryThresholdMs: overrides.query?.slowQueryThresholdMs ?? base.query.slowQueryThresholdMs,
      maxJoinRows: overrides.query?.maxJoinRows ?? base.query.maxJoinRows,
    },
    locks: {
      failureMode: overrides.locks?.failureMode ?? base.locks.failureMode,
    },
  });
}

/**
 * Merge partial configurations. Later ones take precedence; undefined
 * values never override.
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<QuarryConfig> | null | undefined>
): DeepPartial<QuarryConfig> {
  return configs.reduce<DeepPartial<QuarryConfig>>((merged, next) => {
    if (!next) return merged;
    return {
      logging: {
        level: next.logging?.level ?? merged.logging?.level,
        format: next.logging?.format ?? merged.logging?.format,
      },
      query: {
        slowQueryThresholdMs: next.query?.slowQueryThresholdMs ?? merged.query?.slowQueryThresholdMs,
        maxJoinRows: next.query?.maxJoinRows ?? merged.query?.maxJoinRows,
      },
      locks: {
        failureMode: next.locks?.failureMode ?? merged.locks?.failureMode,
      },
    };
  }, {});
}

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Parsed value, or undefined when the variable is unset or invalid.
 */
function readEnv<O>(
  raw: string | undefined,
  schema: z.ZodType<O, z.ZodTypeDef, unknown>
): O | undefined {
  if (raw === undefined) return undefined;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Create configuration from environment variables named
 * `<PREFIX>_<SECTION>_<FIELD>`:
 * - QUARRY_LOGGING_LEVEL=debug
 * - QUARRY_LOGGING_FORMAT=pretty
 * - QUARRY_QUERY_SLOW_QUERY_THRESHOLD_MS=100
 * - QUARRY_QUERY_MAX_JOIN_ROWS=100000
 * - QUARRY_LOCKS_FAILURE_MODE=skip
 *
 * Values that do not parse are ignored.
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): QuarryConfig {
  const prefix = options.prefix ?? 'QUARRY';
  const env = options.env ?? process.env;
  const read = (...parts: string[]) => getEnvVar(env, prefix, ...parts);

  return createConfig({
    logging: {
      level: readEnv(read('logging', 'level')?.toLowerCase(), LogLevelSchema),
      format: readEnv(read('logging', 'format')?.toLowerCase(), LogFormatSchema),
    },
    query: {
      slowQueryThresholdMs: readEnv(read('query', 'slow_query_threshold_ms'), EnvMillisecondsSchema),
      maxJoinRows: readEnv(read('query', 'max_join_rows'), EnvRowCountSchema),
    },
    locks: {
      failureMode: readEnv(read('locks', 'failure_mode')?.toLowerCase(), FailureModeSchema),
    },
  });
}

/**
 * Parse a JSON configuration document and merge it over `base`.
 *
 * @throws ValidationError with code JSON_PARSE_ERROR when the text is not
 * JSON, or CONFIG_VALIDATION_ERROR when it does not match the schema
 *
 * @example
 * ```typescript
 * const config = parseConfigJSON(readFileSync('quarry.json', 'utf8'));
 * ```
 */
export function parseConfigJSON(json: string, base: QuarryConfig = DEFAULT_CONFIG): QuarryConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError(
      `Invalid configuration JSON: ${toError(error).message}`,
      ErrorCode.JSON_PARSE_ERROR,
      undefined,
      'Check the document for trailing commas or unquoted keys'
    );
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ')}`,
      ErrorCode.CONFIG_VALIDATION_ERROR,
      { issues }
    );
  }

  return createConfig(parsed.data, base);
}
