/**
 * @tabq/cli Query Command
 *
 * Loads a CSV file and runs at most one operation on it: a filter, an
 * aggregation, or a (possibly sorted) listing of every row.
 */

import { setImmediate } from 'node:timers/promises';
import {
  aggregateOutcome,
  createNoopLogger,
  DecodingError,
  loadDataset,
  NotFoundError,
  parseAggregate,
  parseCondition,
  parseOrderBy,
  ValidationError,
  withContext,
  type Dataset,
  type QueryResult,
} from '@tabq/core';
import { createCsvFileSource } from '../csv-source.js';
import { renderResult } from '../render.js';
import type { QueryCommandResult, QueryOptions } from '../types.js';

// Re-export types for external use
export type { QueryOptions, QueryCommandResult };

type Phase = 'load' | 'filter' | 'aggregate' | 'sort';

const VALIDATION_PREFIXES: Record<Phase, string> = {
  load: 'Validation error',
  filter: 'Filter validation error',
  aggregate: 'Aggregation validation error',
  sort: 'Sort validation error',
};

/**
 * Map a failure to its one-line diagnostic.
 */
export function describeFailure(error: unknown, phase: Phase): string {
  if (error instanceof ValidationError) {
    return `${VALIDATION_PREFIXES[phase]}: ${error.message}`;
  }
  if (error instanceof NotFoundError) {
    return `Error: ${error.message}`;
  }
  if (error instanceof DecodingError) {
    return `Encoding error: ${error.message}`;
  }
  return `Unexpected error: ${error instanceof Error ? error.message : String(error)}`;
}

function failure(error: unknown, phase: Phase): QueryCommandResult {
  return { success: false, exitCode: 1, error: describeFailure(error, phase) };
}

export const INTERRUPTED_MESSAGE = 'Operation interrupted by user';

const INTERRUPTED: QueryCommandResult = { success: false, exitCode: 1, error: INTERRUPTED_MESSAGE };

/**
 * Let pending signal handlers run, then report whether `signal` has fired.
 */
async function interrupted(signal: AbortSignal | undefined): Promise<boolean> {
  if (!signal) return false;
  await setImmediate();
  return signal.aborted;
}

/**
 * Query command: load, then filter, aggregate or list.
 *
 * `where` wins over `aggregate`, which wins over a plain listing. `orderBy`
 * only applies to the plain listing. Between phases the command yields to
 * the event loop and stops once `signal` is aborted.
 */
export async function queryCommand(options: QueryOptions): Promise<QueryCommandResult> {
  const { file, where, aggregate, orderBy, config, signal } = options;
  const logger = withContext(options.logger ?? createNoopLogger(), {
    service: 'tabq',
    source: file,
  });

  if (await interrupted(signal)) return { ...INTERRUPTED };

  let dataset: Dataset;
  try {
    dataset = loadDataset(
      createCsvFileSource(file, { maxFileSizeBytes: config.input.maxFileSizeBytes }),
      { logger }
    );
  } catch (error) {
    return failure(error, 'load');
  }

  if (await interrupted(signal)) return { ...INTERRUPTED };

  let phase: Phase = 'load';
  let result: QueryResult;
  try {
    if (where !== undefined) {
      phase = 'filter';
      result = dataset.toResult(dataset.filter(parseCondition(where)));
    } else if (aggregate !== undefined) {
      phase = 'aggregate';
      result = aggregateOutcome(dataset.aggregate(parseAggregate(aggregate)));
    } else if (orderBy !== undefined) {
      phase = 'sort';
      result = dataset.toResult(dataset.sort(parseOrderBy(orderBy)));
    } else {
      result = dataset.toResult();
    }
  } catch (error) {
    return failure(error, phase);
  }

  if (orderBy !== undefined && (where !== undefined || aggregate !== undefined)) {
    logger.warn('--order-by is ignored when --where or --aggregate is given', {
      operation: where !== undefined ? 'filter' : 'aggregate',
      orderBy,
    });
  }

  if (await interrupted(signal)) return { ...INTERRUPTED };

  let output: string;
  try {
    output = renderResult(result, config.output);
  } catch (error) {
    return failure(error, phase);
  }

  if (await interrupted(signal)) return { ...INTERRUPTED };

  return { success: true, exitCode: 0, output };
}
