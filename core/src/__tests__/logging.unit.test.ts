import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogLevel,
  LogLevels,
  withContext,
  type LogEntry,
} from '../logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Levels
// =============================================================================

describe('LogLevels', () => {
  it('should order levels', () => {
    expect(LogLevels.isAtLeast('warn', 'info')).toBe(true);
    expect(LogLevels.isAtLeast('debug', 'info')).toBe(false);
    expect(LogLevels.order('error')).toBe(3);
  });

  it('should recognize level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});

// =============================================================================
// Loggers
// =============================================================================

describe('createLogger', () => {
  it('should drop entries below the minimum level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ minLevel: 'warn', output: entry => entries.push(entry) });

    logger.debug('d');
    logger.info('i');
    logger.warn('w', { operation: 'count' });
    logger.error('e', new Error('boom'));

    expect(entries.map(e => e.level)).toEqual(['warn', 'error']);
    expect(entries[0].context).toEqual({ operation: 'count' });
    expect(entries[1].error?.message).toBe('boom');
  });
});

describe('createTestLogger', () => {
  it('should capture entries by level and clear them', () => {
    const logger = createTestLogger();
    logger.debug('a');
    logger.warn('b');
    logger.warn('c');

    expect(logger.getLogs()).toHaveLength(3);
    expect(logger.getLogsByLevel('warn').map(e => e.message)).toEqual(['b', 'c']);

    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });
});

describe('createNoopLogger', () => {
  it('should accept every call', () => {
    const logger = createNoopLogger();
    expect(() => {
      logger.debug('x');
      logger.error('x', new Error('x'));
    }).not.toThrow();
  });
});

describe('withContext', () => {
  it('should merge bound context under call context', () => {
    const logger = createTestLogger();
    const child = withContext(logger, { service: 'inventory', operation: 'default' });

    child.info('one');
    child.info('two', { operation: 'count' });

    const [one, two] = logger.getLogs();
    expect(one.context).toEqual({ service: 'inventory', operation: 'default' });
    expect(two.context).toEqual({ service: 'inventory', operation: 'count' });
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe('formatLogEntry', () => {
  const entry: LogEntry = {
    level: 'info',
    message: 'query completed',
    timestamp: 0,
    context: { operation: 'count' },
  };

  it('should format JSON', () => {
    expect(formatLogEntry(entry, 'json')).toBe(
      '{"level":"info","message":"query completed","timestamp":0,"context":{"operation":"count"}}'
    );
  });

  it('should format pretty lines', () => {
    expect(formatLogEntry(entry, 'pretty')).toBe(
      '[1970-01-01T00:00:00.000Z] INFO  query completed {"operation":"count"}'
    );
  });
});

describe('createConsoleLogger', () => {
  it('should write JSON lines to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createConsoleLogger({ minLevel: 'info' });

    logger.debug('hidden');
    logger.info('shown', { rowsProcessed: 3 });

    expect(log).toHaveBeenCalledTimes(1);
    const line = log.mock.calls[0][0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'info',
      message: 'shown',
      context: { rowsProcessed: 3 },
    });
  });
});
