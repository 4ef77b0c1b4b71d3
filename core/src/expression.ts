/**
 * @tabq/core - Expression Grammars
 *
 * Three compact command-line expressions share one shape,
 * `<column><delimiter><value>`:
 *
 * - condition: `price>500`, delimiters `>=`, `<=`, `!=`, `>`, `<`, `=`
 * - aggregate: `price=avg`
 * - order-by:  `price=desc`
 *
 * The first delimiter (in priority order) found anywhere in the text splits
 * it once. Both sides are trimmed and must be non-empty.
 */

import { ErrorCode, ValidationError } from './errors.js';
import {
  COMPARISON_OPERATORS,
  createAggregationRequest,
  createComparison,
  createSortSpec,
  type AggregationRequest,
  type Comparison,
  type SortSpec,
} from './query-ops.js';

// =============================================================================
// Shared Splitter
// =============================================================================

/**
 * Wording and delimiters for one expression grammar.
 */
export interface ExpressionGrammar<D extends string = string> {
  /** Delimiters in priority order */
  delimiters: readonly D[];
  /** What the expression is, for messages ("Filter condition") */
  subject: string;
  /** What the right-hand side is, for messages ("Comparison value") */
  valueLabel: string;
  /** Usage example shown when the format is wrong */
  example: string;
}

export interface SplitExpression<D extends string = string> {
  column: string;
  delimiter: D;
  value: string;
}

/**
 * Split `text` on the first delimiter of `grammar` that occurs in it.
 *
 * @throws ValidationError for empty input, no delimiter, or an empty side
 */
export function splitExpression<D extends string>(
  text: string,
  grammar: ExpressionGrammar<D>
): SplitExpression<D> {
  if (text.trim().length === 0) {
    throw ValidationError.invalidExpression(`${grammar.subject} cannot be empty`, text, grammar.example);
  }

  const delimiter = grammar.delimiters.find(d => text.includes(d));
  if (delimiter === undefined) {
    throw ValidationError.invalidExpression(
      `Invalid ${grammar.subject.toLowerCase()} format: ${text}. Example: '${grammar.example}'`,
      text,
      grammar.example
    );
  }

  const at = text.indexOf(delimiter);
  const column = text.slice(0, at).trim();
  const value = text.slice(at + delimiter.length).trim();

  if (column.length === 0) {
    throw new ValidationError('Column name cannot be empty', ErrorCode.INVALID_EXPRESSION, { expression: text });
  }
  if (value.length === 0) {
    throw new ValidationError(`${grammar.valueLabel} cannot be empty`, ErrorCode.INVALID_EXPRESSION, {
      expression: text,
    });
  }

  return { column, delimiter, value };
}

// =============================================================================
// Grammars
// =============================================================================

export const CONDITION_GRAMMAR: ExpressionGrammar<(typeof COMPARISON_OPERATORS)[number]> = {
  delimiters: COMPARISON_OPERATORS,
  subject: 'Filter condition',
  valueLabel: 'Comparison value',
  example: 'price>500',
};

export const AGGREGATE_GRAMMAR: ExpressionGrammar<'='> = {
  delimiters: ['='],
  subject: 'Aggregation',
  valueLabel: 'Aggregation type',
  example: 'price=avg',
};

export const ORDER_BY_GRAMMAR: ExpressionGrammar<'='> = {
  delimiters: ['='],
  subject: 'Sort order',
  valueLabel: 'Sort direction',
  example: 'price=desc',
};

/**
 * Parse a filter condition such as `price>=500` or `brand = apple`.
 */
export function parseCondition(text: string): Comparison {
  const { column, delimiter, value } = splitExpression(text, CONDITION_GRAMMAR);
  return createComparison(column, delimiter, value);
}

/**
 * Parse an aggregation such as `price=avg`. The kind is case-insensitive.
 */
export function parseAggregate(text: string): AggregationRequest {
  const { column, value } = splitExpression(text, AGGREGATE_GRAMMAR);
  return createAggregationRequest(column, value);
}

/**
 * Parse a sort order such as `price=desc`. The direction is case-insensitive.
 */
export function parseOrderBy(text: string): SortSpec {
  const { column, value } = splitExpression(text, ORDER_BY_GRAMMAR);
  return createSortSpec(column, value);
}
