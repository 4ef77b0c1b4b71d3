/**
 * @tabq/core - Result Contract
 *
 * What the core hands to a renderer. The core has no opinion on formatting;
 * whether an empty record list means "no matches" is for the caller to say.
 */

import type { DataRecord } from './query-ops.js';

/**
 * Scalar produced by an aggregation.
 */
export interface AggregateResult {
  result: number;
}

/**
 * Ordered rows from a filter, a sort, or the full dataset.
 */
export interface RecordsResult {
  readonly kind: 'records';
  /** Column order for display */
  readonly headers: readonly string[];
  readonly records: readonly DataRecord[];
}

export interface AggregateOutcome {
  readonly kind: 'aggregate';
  readonly value: AggregateResult;
}

export type QueryResult = RecordsResult | AggregateOutcome;

export function recordsResult(headers: readonly string[], records: readonly DataRecord[]): RecordsResult {
  return { kind: 'records', headers, records };
}

export function aggregateOutcome(value: AggregateResult): AggregateOutcome {
  return { kind: 'aggregate', value };
}
