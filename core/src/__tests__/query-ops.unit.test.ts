/**
 * Tests for comparison, aggregation and sorting over string records
 */

import { describe, it, expect } from 'vitest';
import {
  createComparison,
  createSortSpec,
  createAggregationRequest,
  resolveAggregateKind,
  evaluateComparison,
  filterRecords,
  aggregateValues,
  sortRecords,
  isComparisonOperator,
  isAggregateKind,
  isSortDirection,
  type DataRecord,
} from '../query-ops.js';
import { ErrorCode, ValidationError } from '../errors.js';

const phones: DataRecord[] = [
  { name: 'orbit x', brand: 'nova', price: '999', rating: '4.9' },
  { name: 'pulse 5', brand: 'zenix', price: '1199', rating: '4.8' },
  { name: 'lite 2', brand: 'kappa', price: '199', rating: '4.6' },
  { name: 'mini s', brand: 'nova', price: '299', rating: '4.2' },
];

describe('createComparison', () => {
  it('should build a comparison', () => {
    expect(createComparison('price', '>=', '10')).toEqual({ column: 'price', operator: '>=', operand: '10' });
  });

  it('should reject an unknown operator', () => {
    expect(() => createComparison('price', '=>', '10')).toThrow('Unsupported operator: =>');
  });

  it('should reject a blank column', () => {
    expect(() => createComparison('  ', '>', '10')).toThrow('Column name cannot be empty');
  });
});

describe('createSortSpec', () => {
  it('should default to ascending', () => {
    expect(createSortSpec('price')).toEqual({ column: 'price', direction: 'asc' });
  });

  it('should normalise the direction', () => {
    expect(createSortSpec('price', 'DESC').direction).toBe('desc');
  });
});

describe('resolveAggregateKind', () => {
  it('should resolve every supported kind', () => {
    for (const kind of ['avg', 'min', 'max', 'median', 'sum', 'count']) {
      expect(resolveAggregateKind(kind.toUpperCase())).toBe(kind);
    }
  });

  it('should raise UNSUPPORTED_AGGREGATION for anything else', () => {
    expect(() => resolveAggregateKind('stddev')).toThrow(ValidationError);
  });

  it('should back createAggregationRequest', () => {
    expect(createAggregationRequest('price', 'Sum')).toEqual({ column: 'price', kind: 'sum' });
  });
});

describe('guards', () => {
  it('should recognise operators, kinds and directions', () => {
    expect(isComparisonOperator('!=')).toBe(true);
    expect(isComparisonOperator('==')).toBe(false);
    expect(isAggregateKind('median')).toBe(true);
    expect(isAggregateKind('AVG')).toBe(false);
    expect(isSortDirection('asc')).toBe(true);
    expect(isSortDirection('up')).toBe(false);
  });
});

describe('evaluateComparison', () => {
  it('should compare numerically when both sides parse', () => {
    const record: DataRecord = { code: '007' };
    expect(evaluateComparison(createComparison('code', '>', '6'), record)).toBe(true);
    expect(evaluateComparison(createComparison('code', '=', '7'), record)).toBe(true);
    expect(evaluateComparison(createComparison('code', '=', '7.0'), record)).toBe(true);
  });

  it('should compare strings when either side does not parse', () => {
    const record: DataRecord = { brand: 'nova' };
    expect(evaluateComparison(createComparison('brand', '=', 'nova'), record)).toBe(true);
    expect(evaluateComparison(createComparison('brand', '=', 'Nova'), record)).toBe(false);
    expect(evaluateComparison(createComparison('brand', '>', 'kappa'), record)).toBe(true);
    expect(evaluateComparison(createComparison('brand', '!=', 'kappa'), record)).toBe(true);
  });

  it('should compare numeric text against free text as strings', () => {
    // '10' < '9' by code unit
    expect(evaluateComparison(createComparison('v', '<', '9x'), { v: '10' })).toBe(true);
  });

  it('should support inclusive bounds', () => {
    const record: DataRecord = { price: '500' };
    expect(evaluateComparison(createComparison('price', '>=', '500'), record)).toBe(true);
    expect(evaluateComparison(createComparison('price', '<=', '500'), record)).toBe(true);
    expect(evaluateComparison(createComparison('price', '<', '500'), record)).toBe(false);
  });

  it('should never match a record without the column', () => {
    expect(evaluateComparison(createComparison('missing', '!=', 'x'), { price: '1' })).toBe(false);
  });
});

describe('filterRecords', () => {
  it('should keep matching records in order', () => {
    const matched = filterRecords(phones, createComparison('price', '>', '500'));
    expect(matched.map(r => r.name)).toEqual(['orbit x', 'pulse 5']);
  });

  it('should return an empty list when nothing matches', () => {
    expect(filterRecords(phones, createComparison('brand', '=', 'none'))).toEqual([]);
  });
});

describe('aggregateValues', () => {
  const prices = phones.map(r => r.price);

  it('should average', () => {
    expect(aggregateValues('avg', prices)).toBe(674);
  });

  it('should find min and max', () => {
    expect(aggregateValues('min', prices)).toBe(199);
    expect(aggregateValues('max', prices)).toBe(1199);
  });

  it('should take the middle of an odd count', () => {
    expect(aggregateValues('median', ['5', '1', '9', '3', '7'])).toBe(5);
  });

  it('should average the two middle values of an even count', () => {
    expect(aggregateValues('median', ['1', '3', '5', '7'])).toBe(4);
  });

  it('should sum, skipping text', () => {
    expect(aggregateValues('sum', ['1', 'abc', '3'])).toBe(4);
  });

  it('should count non-blank values, numeric or not', () => {
    expect(aggregateValues('count', ['1', '', '3', '   ', '5'])).toBe(3);
    expect(aggregateValues('count', ['a', 'b'])).toBe(2);
  });

  it('should yield 0 for empty input', () => {
    expect(aggregateValues('avg', [])).toBe(0);
    expect(aggregateValues('median', [])).toBe(0);
    expect(aggregateValues('count', [])).toBe(0);
  });

  it('should yield 0 when nothing parses', () => {
    expect(aggregateValues('max', ['n/a', ''])).toBe(0);
  });
});

describe('sortRecords', () => {
  it('should sort numerically ascending', () => {
    const sorted = sortRecords(phones, createSortSpec('price', 'asc'));
    expect(sorted.map(r => r.price)).toEqual(['199', '299', '999', '1199']);
  });

  it('should sort numerically descending', () => {
    const sorted = sortRecords(phones, createSortSpec('price', 'desc'));
    expect(sorted.map(r => r.price)).toEqual(['1199', '999', '299', '199']);
  });

  it('should sort text by code unit', () => {
    const sorted = sortRecords(phones, createSortSpec('brand', 'asc'));
    expect(sorted.map(r => r.brand)).toEqual(['kappa', 'nova', 'nova', 'zenix']);
  });

  it('should place NaN cells after the other numbers and before text', () => {
    const records: DataRecord[] = [
      { id: 'a', k: '3' },
      { id: 'b', k: 'nan' },
      { id: 'c', k: '1' },
      { id: 'd', k: 'x' },
      { id: 'e', k: 'NaN' },
      { id: 'f', k: '2' },
    ];
    expect(sortRecords(records, createSortSpec('k', 'asc')).map(r => r.id)).toEqual(['c', 'f', 'a', 'b', 'e', 'd']);
    expect(sortRecords(records, createSortSpec('k', 'desc')).map(r => r.id)).toEqual(['d', 'b', 'e', 'a', 'f', 'c']);
  });

  it('should keep ties in input order in both directions', () => {
    const records: DataRecord[] = [
      { id: 'a', k: '1' },
      { id: 'b', k: '2' },
      { id: 'c', k: '1' },
      { id: 'd', k: '2' },
    ];
    expect(sortRecords(records, createSortSpec('k', 'asc')).map(r => r.id)).toEqual(['a', 'c', 'b', 'd']);
    expect(sortRecords(records, createSortSpec('k', 'desc')).map(r => r.id)).toEqual(['b', 'd', 'a', 'c']);
  });

  it('should put numbers before text in a mixed column', () => {
    const records: DataRecord[] = [{ v: 'b' }, { v: '10' }, { v: 'a' }, { v: '2' }];
    expect(sortRecords(records, createSortSpec('v')).map(r => r.v)).toEqual(['2', '10', 'a', 'b']);
  });

  it('should not mutate the input', () => {
    const copy = [...phones];
    sortRecords(phones, createSortSpec('price', 'desc'));
    expect(phones).toEqual(copy);
  });

  it('should return [] for empty input without checking the column', () => {
    expect(sortRecords([], createSortSpec('anything', 'desc'))).toEqual([]);
  });

  it('should reject a column missing from the first record', () => {
    try {
      sortRecords(phones, createSortSpec('cost'));
      expect.unreachable('sortRecords should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe("Column 'cost' not found in data");
        expect(error.code).toBe(ErrorCode.COLUMN_NOT_FOUND);
      }
    }
  });
});
