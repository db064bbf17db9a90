/**
 * @quarry/config - Schemas
 *
 * zod schemas for configuration read from JSON or the environment.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const LogFormatSchema = z.enum(['json', 'pretty']);
export const FailureModeSchema = z.enum(['abort', 'skip']);

const MillisecondsSchema = z.number().finite().nonnegative();
const RowCountSchema = z.number().int().nonnegative();

/**
 * Shape of a configuration file. Every field is optional; unknown keys are
 * rejected so misspelled settings do not pass silently.
 */
export const PartialConfigSchema = z
  .object({
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        format: LogFormatSchema.optional(),
      })
      .strict()
      .optional(),
    query: z
      .object({
        slowQueryThresholdMs: MillisecondsSchema.optional(),
        maxJoinRows: RowCountSchema.optional(),
      })
      .strict()
      .optional(),
    locks: z
      .object({
        failureMode: FailureModeSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type PartialConfigInput = z.infer<typeof PartialConfigSchema>;

// Environment values arrive as strings
export const EnvMillisecondsSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/)
  .transform(Number);

export const EnvRowCountSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number)
  .pipe(RowCountSchema);
