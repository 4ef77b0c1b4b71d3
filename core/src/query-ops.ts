/**
 * @tabq/core - Query Operations
 *
 * Comparison evaluation, aggregation and sorting over string-valued records.
 * Every decision about numbers versus text goes through `./coerce.js`.
 */

import { coerceKey, coercePair, compareKeys, parseNumber } from './coerce.js';
import { ErrorCode, ValidationError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One data row: column name to raw cell text.
 */
export type DataRecord = Readonly<Record<string, string>>;

/**
 * Comparison operators, longest first. Grammar scanning relies on this order
 * so that `>=` is never read as `>`.
 */
export const COMPARISON_OPERATORS = ['>=', '<=', '!=', '>', '<', '='] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

/**
 * Single-column row predicate.
 */
export interface Comparison {
  readonly column: string;
  readonly operator: ComparisonOperator;
  readonly operand: string;
}

export const SORT_DIRECTIONS = ['asc', 'desc'] as const;

export type SortDirection = (typeof SORT_DIRECTIONS)[number];

export interface SortSpec {
  readonly column: string;
  readonly direction: SortDirection;
}

/**
 * Aggregation kinds, in the order diagnostics list them.
 */
export const AGGREGATE_KINDS = ['avg', 'min', 'max', 'median', 'sum', 'count'] as const;

export type AggregateKind = (typeof AGGREGATE_KINDS)[number];

export interface AggregationRequest {
  readonly column: string;
  readonly kind: AggregateKind;
}

// =============================================================================
// Construction
// =============================================================================

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return (COMPARISON_OPERATORS as readonly string[]).includes(value);
}

export function isSortDirection(value: string): value is SortDirection {
  return (SORT_DIRECTIONS as readonly string[]).includes(value);
}

export function isAggregateKind(value: string): value is AggregateKind {
  return (AGGREGATE_KINDS as readonly string[]).includes(value);
}

function requireColumn(column: string): void {
  if (column.trim().length === 0) {
    throw new ValidationError('Column name cannot be empty', ErrorCode.INVALID_EXPRESSION, { column });
  }
}

/**
 * Build a validated Comparison.
 *
 * @throws ValidationError when the column is blank or the operator unknown
 */
export function createComparison(column: string, operator: string, operand: string): Comparison {
  requireColumn(column);
  if (!isComparisonOperator(operator)) {
    throw new ValidationError(
      `Unsupported operator: ${operator}`,
      ErrorCode.INVALID_OPERATOR,
      { operator },
      `Valid operators: ${COMPARISON_OPERATORS.join(', ')}`
    );
  }
  return { column, operator, operand };
}

/**
 * Build a validated SortSpec. The direction is matched case-insensitively.
 * Column existence is checked later, against the data being sorted.
 */
export function createSortSpec(column: string, direction: string = 'asc'): SortSpec {
  const normalized = direction.toLowerCase();
  if (!isSortDirection(normalized)) {
    throw new ValidationError(
      `Invalid sort direction: ${direction}. Use 'asc' or 'desc'`,
      ErrorCode.INVALID_SORT_DIRECTION,
      { direction }
    );
  }
  return { column, direction: normalized };
}

/**
 * Resolve an aggregation name (case-insensitive) to its kind.
 *
 * @throws ValidationError listing the supported kinds
 */
export function resolveAggregateKind(name: string): AggregateKind {
  const normalized = name.toLowerCase();
  if (!isAggregateKind(normalized)) {
    throw new ValidationError(
      `Unsupported aggregation type: ${name}. Supported: ${AGGREGATE_KINDS.join(', ')}`,
      ErrorCode.UNSUPPORTED_AGGREGATION,
      { kind: name, supported: [...AGGREGATE_KINDS] }
    );
  }
  return normalized;
}

export function createAggregationRequest(column: string, kind: string): AggregationRequest {
  return { column, kind: resolveAggregateKind(kind) };
}

// =============================================================================
// Comparison Evaluation
// =============================================================================

function applyOperator<T extends number | string>(operator: ComparisonOperator, left: T, right: T): boolean {
  switch (operator) {
    case '>':
      return left > right;
    case '<':
      return left < right;
    case '=':
      return left === right;
    case '>=':
      return left >= right;
    case '<=':
      return left <= right;
    case '!=':
      return left !== right;
    default: {
      const unhandled: never = operator;
      throw new Error(`Unhandled comparison operator: ${String(unhandled)}`);
    }
  }
}

/**
 * Test one record against a comparison.
 *
 * A record without the column never matches. When both the cell and the
 * operand read as numbers they compare numerically (`'007' > '6'`); otherwise
 * the original strings are compared.
 */
export function evaluateComparison(comparison: Comparison, record: DataRecord): boolean {
  if (!Object.hasOwn(record, comparison.column)) {
    return false;
  }

  const pair = coercePair(record[comparison.column], comparison.operand);
  if (pair.kind === 'number') {
    return applyOperator<number>(comparison.operator, pair.left, pair.right);
  }
  return applyOperator<string>(comparison.operator, pair.left, pair.right);
}

/**
 * Keep the records that satisfy `comparison`, in their original order.
 */
export function filterRecords(records: readonly DataRecord[], comparison: Comparison): DataRecord[] {
  return records.filter(record => evaluateComparison(comparison, record));
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Accumulator for one aggregation pass.
 */
interface Aggregator {
  update(value: string): void;
  finalize(): number;
}

/**
 * Collects the numeric values of a column, skipping text that does not parse.
 */
function numericAggregator(reduce: (values: number[]) => number): Aggregator {
  const values: number[] = [];
  return {
    update(value) {
      const n = parseNumber(value);
      if (n !== undefined) values.push(n);
    },
    finalize() {
      return values.length === 0 ? 0 : reduce(values);
    },
  };
}

function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

function median(values: number[]): number {
  const sorted = values.slice().sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function createAggregator(kind: AggregateKind): Aggregator {
  switch (kind) {
    case 'avg':
      return numericAggregator(values => sum(values) / values.length);
    case 'min':
      return numericAggregator(values => values.reduce((lo, v) => (v < lo ? v : lo)));
    case 'max':
      return numericAggregator(values => values.reduce((hi, v) => (v > hi ? v : hi)));
    case 'median':
      return numericAggregator(median);
    case 'sum':
      return numericAggregator(sum);
    case 'count': {
      let count = 0;
      return {
        update(value) {
          if (value.trim().length > 0) count++;
        },
        finalize() {
          return count;
        },
      };
    }
    default: {
      const unhandled: never = kind;
      throw new Error(`Unhandled aggregate kind: ${String(unhandled)}`);
    }
  }
}

/**
 * Reduce raw column values to one number.
 *
 * Numeric kinds ignore values that do not parse and yield 0 when none do.
 * `count` counts values that are not blank.
 */
export function aggregateValues(kind: AggregateKind, values: readonly string[]): number {
  const aggregator = createAggregator(kind);
  for (const value of values) {
    aggregator.update(value);
  }
  return aggregator.finalize();
}

// =============================================================================
// Sorting
// =============================================================================

/**
 * Return a sorted copy of `records`.
 *
 * Keys are numeric where the cell parses and raw text otherwise; see
 * `compareKeys` for how a mixed column orders. Equal keys keep their input
 * order in both directions: descending sorts the reversed input ascending
 * and reverses the result.
 *
 * @throws ValidationError when records exist and the first lacks the column
 */
export function sortRecords(records: readonly DataRecord[], spec: SortSpec): DataRecord[] {
  if (records.length === 0) {
    return [];
  }
  if (!Object.hasOwn(records[0], spec.column)) {
    throw ValidationError.columnNotInData(spec.column);
  }

  const keyed = records.map(record => ({
    record,
    key: coerceKey(record[spec.column] ?? ''),
  }));

  if (spec.direction === 'desc') {
    keyed.reverse();
  }
  keyed.sort((a, b) => compareKeys(a.key, b.key));
  if (spec.direction === 'desc') {
    keyed.reverse();
  }

  return keyed.map(entry => entry.record);
}
