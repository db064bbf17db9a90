/**
 * @quarry/core - Query telemetry
 *
 * Times each terminal pass and reports it through the configured logger:
 * one `debug` entry per pass, plus a `warn` entry when the pass was slow.
 */

import { createNoopLogger, type LogContext, type Logger } from './logging.js';

/**
 * Options shared by every engine component.
 */
export interface EngineOptions {
  /** Logger for pass telemetry (default: no-op) */
  logger?: Logger;
  /** Passes taking at least this long log a warning; 0 disables (default: 0) */
  slowQueryThresholdMs?: number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
}

/**
 * Mutable counters for a single pass.
 */
export interface PassStats {
  rowsProcessed: number;
}

export class QueryTelemetry {
  readonly logger: Logger;
  private readonly slowQueryThresholdMs: number;
  private readonly now: () => number;

  constructor(
    private readonly component: string,
    options: EngineOptions = {}
  ) {
    this.logger = options.logger ?? createNoopLogger();
    this.slowQueryThresholdMs = options.slowQueryThresholdMs ?? 0;
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * Run one pass and log its outcome. Exceptions propagate without a
   * completion entry.
   */
  track<R>(operation: string, pass: (stats: PassStats) => R): R {
    const stats: PassStats = { rowsProcessed: 0 };
    const startedAt = this.now();
    const result = pass(stats);
    const durationMs = this.now() - startedAt;

    const context: LogContext = {
      component: this.component,
      operation,
      rowsProcessed: stats.rowsProcessed,
      durationMs,
    };
    this.logger.debug('query completed', context);

    if (this.slowQueryThresholdMs > 0 && durationMs >= this.slowQueryThresholdMs) {
      this.logger.warn('slow query', { ...context, thresholdMs: this.slowQueryThresholdMs });
    }

    return result;
  }
}
