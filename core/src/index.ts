/**
 * @quarry/core
 *
 * In-process query evaluation over in-memory collections: eager queries,
 * lazy pipelines with early termination, and hash joins, all addressed
 * through typed field accessors.
 */

// Errors
export {
  ErrorCode,
  isErrorCode,
  QuarryError,
  QueryError,
  ValidationError,
  toError,
} from './errors.js';
export { captureStackTrace } from './stack-trace.js';

// Result
export {
  ok,
  err,
  isOk,
  isErr,
  partition,
  type Ok,
  type Err,
  type Result,
} from './result.js';

// Logging
export {
  LogLevels,
  isLogLevel,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';

// Guards
export { isNullish, assertCount } from './guards.js';

// Accessors and sources
export {
  field,
  path,
  defaultCloner,
  isPresent,
  type FieldAccessor,
  type FieldPredicate,
  type RecordPredicate,
  type NumericAccessor,
  type DateAccessor,
  type Cloner,
} from './field.js';
export {
  isQueryable,
  toIterable,
  toArray,
  fromMapValues,
  type Queryable,
  type QuerySource,
} from './queryable.js';

// Ordering and aggregation
export {
  compareKeys,
  compareFloat,
  reversed,
  sortByKey,
  Extremum,
  type Comparable,
  type Comparator,
  type SortKey,
} from './ordering.js';
export {
  sumAggregator,
  avgAggregator,
  countAggregator,
  extremumAggregator,
  floatExtremumAggregator,
  avgTimestampAggregator,
  type Aggregator,
  type NumericValue,
} from './aggregate.js';
export { PredicateChain } from './predicate.js';
export { KeyIndex, groupInto } from './key-index.js';
export { QueryTelemetry, type EngineOptions, type PassStats } from './telemetry.js';

// Date/time
export {
  MINUTE_MS,
  HOUR_MS,
  DAY_MS,
  BUSINESS_DAY_START_HOUR,
  BUSINESS_DAY_END_HOUR,
  isAfter,
  isBefore,
  isBetween,
  isSameDay,
  dayOfWeek,
  isWeekend,
  isWeekday,
  isBusinessHours,
  extractMonth,
  startOfDay,
  addDays,
  daysBetween,
  hoursBetween,
} from './datetime.js';

// Engines
export { EagerQuery, query, type EagerQueryOptions, type SkippedQuery } from './query.js';
export { LazyPipeline, lazy, type LazyPipelineOptions } from './lazy.js';
export { JoinEngine, join, buildIndex, type JoinOptions } from './join.js';
