/**
 * Structured logging for quarry
 *
 * Every engine component takes an optional `logger`; when none is given a
 * no-op logger is used, so logging costs nothing unless a caller opts in.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext, query } from '@quarry/core';
 *
 * const logger = withContext(createConsoleLogger({ format: 'pretty', minLevel: 'debug' }), {
 *   service: 'inventory',
 * });
 *
 * query(products, { logger }).filter(category, c => c === 'tools').count();
 * // [2024-05-01T10:00:00.000Z] DEBUG query completed {"service":"inventory","operation":"count",...}
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Allowed value types in log context (JSON-serializable)
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Terminal or builder operation, e.g. 'count', 'innerJoin' */
  operation?: string;
  /** Elements pulled from the source during the pass */
  rowsProcessed?: number;
  /** Elements produced by the terminal */
  rowsReturned?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code for error/warn logs */
  errorCode?: string;
  /** Additional custom fields */
  [key: string]: LogContextValue | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Custom output function for log entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for structured logs, 'pretty' for human-readable */
  format?: 'json' | 'pretty';
}

/**
 * Test logger with additional methods for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  /**
   * Check if a level is at least as high as a minimum level
   */
  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// =============================================================================
// Logger Factory Functions
// =============================================================================

function buildEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = { level, message, timestamp: Date.now() };
  if (context !== undefined) {
    entry.context = context;
  }
  if (error !== undefined) {
    entry.error = error;
  }
  return entry;
}

/**
 * Create a logger with custom configuration
 *
 * @example
 * ```typescript
 * const entries: LogEntry[] = [];
 * const logger = createLogger({ minLevel: 'warn', output: entry => entries.push(entry) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;
    output(buildEntry(level, message, context, error));
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Format a log entry as a single line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }

  return output;
}

/**
 * Create a logger that writes to the console ('json' by default)
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      console.log(formatLogEntry(entry, format));
    },
  });
}

/**
 * Create a no-op logger that discards all log messages
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a test logger that captures log entries for assertions
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * query(rows, { logger }).count();
 * expect(logger.getLogsByLevel('debug')[0].context?.operation).toBe('count');
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const inner = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
    },
  });

  return {
    ...inner,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that adds `context` to every entry.
 * Context given at log time wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
