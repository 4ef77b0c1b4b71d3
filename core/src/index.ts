/**
 * @tabq/core
 *
 * Filter, aggregate and sort engine for string-valued tabular data, with the
 * expression grammars that drive it.
 *
 * @example
 * ```typescript
 * import { loadDataset, parseCondition, parseAggregate } from '@tabq/core';
 *
 * const dataset = loadDataset(source);
 * const expensive = dataset.filter(parseCondition('price>500'));
 * const { result } = dataset.aggregate(parseAggregate('price=avg'));
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  TabqError,
  isTabqError,
  ValidationError,
  NotFoundError,
  DecodingError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  withContext,
  isLogContextValue,
  LogLevels,
  LOG_LEVELS,
} from './logging.js';

export type {
  LogLevel,
  LogContext,
  LogContextValue,
  LogEntry,
  Logger,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging.js';

// =============================================================================
// Coercion
// =============================================================================

export { parseNumber, isNumeric, coerceKey, coercePair, compareKeys, compareText } from './coerce.js';
export type { CoercedKey, CoercedPair } from './coerce.js';

// =============================================================================
// Query Operations
// =============================================================================

export {
  COMPARISON_OPERATORS,
  SORT_DIRECTIONS,
  AGGREGATE_KINDS,
  isComparisonOperator,
  isSortDirection,
  isAggregateKind,
  createComparison,
  createSortSpec,
  createAggregationRequest,
  resolveAggregateKind,
  evaluateComparison,
  filterRecords,
  aggregateValues,
  sortRecords,
} from './query-ops.js';

export type {
  DataRecord,
  ComparisonOperator,
  Comparison,
  SortDirection,
  SortSpec,
  AggregateKind,
  AggregationRequest,
} from './query-ops.js';

// =============================================================================
// Expressions
// =============================================================================

export {
  splitExpression,
  parseCondition,
  parseAggregate,
  parseOrderBy,
  CONDITION_GRAMMAR,
  AGGREGATE_GRAMMAR,
  ORDER_BY_GRAMMAR,
} from './expression.js';

export type { ExpressionGrammar, SplitExpression } from './expression.js';

// =============================================================================
// Dataset & Results
// =============================================================================

export { Dataset, loadDataset, assertHeaderLine } from './dataset.js';
export type { TabularSource, DatasetOptions } from './dataset.js';

export { recordsResult, aggregateOutcome } from './result.js';
export type { AggregateResult, RecordsResult, AggregateOutcome, QueryResult } from './result.js';
