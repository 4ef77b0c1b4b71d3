/**
 * Tests for the condition, aggregate and order-by grammars
 */

import { describe, it, expect } from 'vitest';
import {
  splitExpression,
  parseCondition,
  parseAggregate,
  parseOrderBy,
  CONDITION_GRAMMAR,
  AGGREGATE_GRAMMAR,
} from '../expression.js';
import { ErrorCode, ValidationError } from '../errors.js';

function captureError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

describe('splitExpression', () => {
  it('should split once on the first matching delimiter', () => {
    expect(splitExpression('note=a=b', AGGREGATE_GRAMMAR)).toEqual({
      column: 'note',
      delimiter: '=',
      value: 'a=b',
    });
  });

  it('should prefer two-character operators', () => {
    expect(splitExpression('price>=500', CONDITION_GRAMMAR).delimiter).toBe('>=');
    expect(splitExpression('price<=500', CONDITION_GRAMMAR).delimiter).toBe('<=');
    expect(splitExpression('brand!=apple', CONDITION_GRAMMAR).delimiter).toBe('!=');
  });

  it('should pick by operator priority, not position', () => {
    // '>' outranks '=' even though '=' appears first
    expect(splitExpression('a=b>c', CONDITION_GRAMMAR)).toEqual({
      column: 'a=b',
      delimiter: '>',
      value: 'c',
    });
  });
});

describe('parseCondition', () => {
  it('should parse each operator', () => {
    expect(parseCondition('price>500')).toEqual({ column: 'price', operator: '>', operand: '500' });
    expect(parseCondition('price<500')).toEqual({ column: 'price', operator: '<', operand: '500' });
    expect(parseCondition('brand=apple')).toEqual({ column: 'brand', operator: '=', operand: 'apple' });
    expect(parseCondition('rating>=4.5').operator).toBe('>=');
  });

  it('should trim column and operand', () => {
    expect(parseCondition('  brand  =  apple ')).toEqual({
      column: 'brand',
      operator: '=',
      operand: 'apple',
    });
  });

  it('should reject empty input', () => {
    const error = captureError(() => parseCondition('   '));
    expect(error.message).toBe('Filter condition cannot be empty');
    expect(error.code).toBe(ErrorCode.INVALID_EXPRESSION);
  });

  it('should reject input without an operator', () => {
    const error = captureError(() => parseCondition('price'));
    expect(error.message).toBe("Invalid filter condition format: price. Example: 'price>500'");
    expect(error.suggestion).toBe("Example: 'price>500'");
  });

  it('should reject an empty column', () => {
    expect(captureError(() => parseCondition('>500')).message).toBe('Column name cannot be empty');
  });

  it('should reject an empty operand', () => {
    expect(captureError(() => parseCondition('price> ')).message).toBe('Comparison value cannot be empty');
  });
});

describe('parseAggregate', () => {
  it('should parse column and kind', () => {
    expect(parseAggregate('price=avg')).toEqual({ column: 'price', kind: 'avg' });
  });

  it('should match the kind case-insensitively', () => {
    expect(parseAggregate('price = MEDIAN')).toEqual({ column: 'price', kind: 'median' });
  });

  it('should reject unknown kinds', () => {
    const error = captureError(() => parseAggregate('price=mode'));
    expect(error.message).toBe('Unsupported aggregation type: mode. Supported: avg, min, max, median, sum, count');
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_AGGREGATION);
  });

  it('should reject a missing kind', () => {
    expect(captureError(() => parseAggregate('price=')).message).toBe('Aggregation type cannot be empty');
  });

  it('should reject a missing delimiter', () => {
    expect(captureError(() => parseAggregate('price')).message).toBe(
      "Invalid aggregation format: price. Example: 'price=avg'"
    );
  });
});

describe('parseOrderBy', () => {
  it('should parse column and direction', () => {
    expect(parseOrderBy('price=desc')).toEqual({ column: 'price', direction: 'desc' });
    expect(parseOrderBy('name = ASC')).toEqual({ column: 'name', direction: 'asc' });
  });

  it('should reject unknown directions', () => {
    const error = captureError(() => parseOrderBy('price=up'));
    expect(error.message).toBe("Invalid sort direction: up. Use 'asc' or 'desc'");
    expect(error.code).toBe(ErrorCode.INVALID_SORT_DIRECTION);
  });

  it('should reject empty input', () => {
    expect(captureError(() => parseOrderBy('')).message).toBe('Sort order cannot be empty');
  });

  it('should reject a missing direction', () => {
    expect(captureError(() => parseOrderBy('price=')).message).toBe('Sort direction cannot be empty');
  });
});
