/**
 * @tabq/core - Dataset
 *
 * An in-memory table: ordered header names plus ordered records whose key
 * set always equals the header set. Loading checks that the input really
 * starts with a header row; filter, aggregate and sort then read the
 * records without changing them.
 */

import { isNumeric } from './coerce.js';
import { ValidationError } from './errors.js';
import { createNoopLogger, type Logger } from './logging.js';
import {
  aggregateValues,
  filterRecords,
  sortRecords,
  type AggregationRequest,
  type Comparison,
  type DataRecord,
  type SortSpec,
} from './query-ops.js';
import { recordsResult, type AggregateResult, type RecordsResult } from './result.js';

// =============================================================================
// Source Contract
// =============================================================================

/**
 * Decoded tabular input. Reading and decoding are the source's concern;
 * implementations throw NotFoundError or DecodingError from either method.
 */
export interface TabularSource {
  /** Where the data comes from, for diagnostics */
  readonly location: string;
  /** First physical line of the input, as decoded text */
  firstLine(): string;
  /** All non-empty rows as cell arrays, header row first */
  rows(): readonly (readonly string[])[];
}

export interface DatasetOptions {
  logger?: Logger;
}

// =============================================================================
// Header Detection
// =============================================================================

const LETTER = /\p{L}/u;

/**
 * Reject a first line that cannot be a header row.
 *
 * This is a sniff, not inference: a header row must contain at least one
 * letter, and must not consist solely of comma-separated numbers.
 *
 * @throws ValidationError EMPTY_DATASET for a blank line, MISSING_HEADER otherwise
 */
export function assertHeaderLine(line: string, location?: string): void {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    throw ValidationError.emptyDataset(location);
  }
  if (!LETTER.test(trimmed)) {
    throw ValidationError.missingHeader(location);
  }
  if (trimmed.split(',').every(field => isNumeric(field))) {
    throw ValidationError.missingHeader(location);
  }
}

// Own keys even for names such as '__proto__', which assignment would route
// to the prototype setter.
function toRecord(headers: readonly string[], cells: readonly string[]): DataRecord {
  return Object.freeze(Object.fromEntries(headers.map((header, i) => [header, cells[i] ?? ''])));
}

// =============================================================================
// Dataset
// =============================================================================

export class Dataset {
  readonly headers: readonly string[];
  readonly records: readonly DataRecord[];
  private readonly logger: Logger;

  private constructor(headers: readonly string[], records: readonly DataRecord[], logger: Logger) {
    this.headers = Object.freeze([...headers]);
    this.records = Object.freeze([...records]);
    this.logger = logger;
  }

  /**
   * Build a dataset from header names and positional rows. Short rows are
   * padded with empty strings and surplus cells dropped.
   */
  static fromRows(
    headers: readonly string[],
    rows: readonly (readonly string[])[],
    options: DatasetOptions = {}
  ): Dataset {
    return new Dataset(
      headers,
      rows.map(cells => toRecord(headers, cells)),
      options.logger ?? createNoopLogger()
    );
  }

  /**
   * Build a dataset from keyed records, normalizing each to exactly the
   * header set.
   */
  static fromRecords(
    headers: readonly string[],
    records: readonly Readonly<Record<string, string>>[],
    options: DatasetOptions = {}
  ): Dataset {
    return Dataset.fromRows(
      headers,
      records.map(record => headers.map(h => (Object.hasOwn(record, h) ? record[h] : ''))),
      options
    );
  }

  get size(): number {
    return this.records.length;
  }

  hasColumn(name: string): boolean {
    return this.headers.includes(name);
  }

  /**
   * @throws ValidationError listing every available header
   */
  validateColumn(name: string): void {
    if (!this.hasColumn(name)) {
      throw ValidationError.columnNotFound(name, this.headers);
    }
  }

  /**
   * Records matching `comparison`, in dataset order.
   */
  filter(comparison: Comparison): DataRecord[] {
    this.validateColumn(comparison.column);

    const started = Date.now();
    const matched = filterRecords(this.records, comparison);
    this.logger.debug('Filter applied', {
      operation: 'filter',
      column: comparison.column,
      operator: comparison.operator,
      rowsProcessed: this.records.length,
      rowsMatched: matched.length,
      durationMs: Date.now() - started,
    });
    return matched;
  }

  /**
   * Reduce one column. An empty dataset yields `{ result: 0 }` without
   * looking at the column or the kind.
   */
  aggregate(request: AggregationRequest): AggregateResult {
    if (this.records.length === 0) {
      return { result: 0 };
    }
    this.validateColumn(request.column);

    const started = Date.now();
    const result = aggregateValues(
      request.kind,
      this.records.map(record => record[request.column] ?? '')
    );
    this.logger.debug('Aggregation computed', {
      operation: 'aggregate',
      column: request.column,
      kind: request.kind,
      rowsProcessed: this.records.length,
      durationMs: Date.now() - started,
    });
    return { result };
  }

  /**
   * Sorted copy of the records; the dataset keeps its own order.
   */
  sort(spec: SortSpec): DataRecord[] {
    const started = Date.now();
    const sorted = sortRecords(this.records, spec);
    this.logger.debug('Records sorted', {
      operation: 'sort',
      column: spec.column,
      direction: spec.direction,
      rowsProcessed: sorted.length,
      durationMs: Date.now() - started,
    });
    return sorted;
  }

  /**
   * Wrap `records` (default: all of them) for a renderer, in header order.
   */
  toResult(records: readonly DataRecord[] = this.records): RecordsResult {
    return recordsResult(this.headers, records);
  }
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load and validate a dataset from a decoded source.
 *
 * @throws ValidationError EMPTY_DATASET when there is nothing to read or only a header row
 * @throws ValidationError MISSING_HEADER when the first line is not a header row
 */
export function loadDataset(source: TabularSource, options: DatasetOptions = {}): Dataset {
  const logger = options.logger ?? createNoopLogger();
  const started = Date.now();

  assertHeaderLine(source.firstLine(), source.location);

  const [headers = [], ...rows] = source.rows();
  if (rows.length === 0) {
    if (headers.length === 0) {
      throw ValidationError.missingHeader(source.location);
    }
    throw ValidationError.emptyDataset(source.location);
  }

  const dataset = Dataset.fromRows(headers, rows, { logger });
  logger.debug('Dataset loaded', {
    operation: 'load',
    source: source.location,
    columns: [...dataset.headers],
    rowsProcessed: dataset.size,
    durationMs: Date.now() - started,
  });
  return dataset;
}
