/**
 * @quarry/config - Query context
 *
 * Turns a QuarryConfig into a logger and the option objects the engines
 * take, so one configuration drives every component.
 *
 * @example
 * ```typescript
 * const ctx = createQueryContext(getConfigFromEnv());
 *
 * query(orders, ctx.engine).filter(f('status'), s => s === 'open').count();
 * join(orders, customers, ctx.join).innerJoin(...);
 * lockQuery(inventory, ctx.locks).all();
 * ```
 */

import { createConsoleLogger, type EngineOptions, type JoinOptions, type Logger } from '@quarry/core';
import type { LockFailureMode } from '@quarry/locks';
import { DEFAULT_CONFIG } from './defaults.js';
import type { QuarryConfig } from './types.js';

export interface LockContextOptions extends EngineOptions {
  failureMode: LockFailureMode;
}

export interface LockJoinContextOptions extends JoinOptions {
  failureMode: LockFailureMode;
}

export interface QueryContext {
  readonly config: QuarryConfig;
  readonly logger: Logger;
  /** For EagerQuery and LazyPipeline */
  readonly engine: EngineOptions;
  readonly join: JoinOptions;
  /** For LockQuery and LockLazyQuery */
  readonly locks: LockContextOptions;
  readonly lockJoin: LockJoinContextOptions;
}

export interface QueryContextOverrides {
  /** Replaces the console logger built from `config.logging` */
  logger?: Logger;
  now?: () => number;
}

export function createQueryContext(
  config: QuarryConfig = DEFAULT_CONFIG,
  overrides: QueryContextOverrides = {}
): QueryContext {
  const logger =
    overrides.logger ??
    createConsoleLogger({ minLevel: config.logging.level, format: config.logging.format });

  const engine: EngineOptions = {
    logger,
    slowQueryThresholdMs: config.query.slowQueryThresholdMs,
    now: overrides.now,
  };
  const join: JoinOptions = { ...engine, maxOutputRows: config.query.maxJoinRows };

  return {
    config,
    logger,
    engine,
    join,
    locks: { ...engine, failureMode: config.locks.failureMode },
    lockJoin: { ...join, failureMode: config.locks.failureMode },
  };
}
