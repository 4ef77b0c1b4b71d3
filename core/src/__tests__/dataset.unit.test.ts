/**
 * Tests for Dataset loading and operations
 */

import { describe, it, expect } from 'vitest';
import { Dataset, loadDataset, assertHeaderLine, type TabularSource } from '../dataset.js';
import { ErrorCode, ValidationError } from '../errors.js';
import { createTestLogger } from '../logging.js';
import { createComparison, createSortSpec, createAggregationRequest } from '../query-ops.js';

/**
 * In-memory source splitting lines on '\n' and cells on ','.
 */
function memorySource(text: string): TabularSource {
  return {
    location: 'memory.csv',
    firstLine: () => text.split('\n')[0] ?? '',
    rows: () => text.split('\n').filter(line => line !== '').map(line => line.split(',')),
  };
}

function codeOf(fn: () => unknown): ErrorCode {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.code;
    }
    throw error;
  }
  throw new Error('Expected a ValidationError');
}

const PHONES = [
  'name,brand,price,rating',
  'orbit x,nova,999,4.9',
  'pulse 5,zenix,1199,4.8',
  'lite 2,kappa,199,4.6',
  'mini s,nova,299,4.2',
].join('\n');

describe('assertHeaderLine', () => {
  it('should accept a line with letters', () => {
    expect(() => assertHeaderLine('name,price')).not.toThrow();
    expect(() => assertHeaderLine('id,2024')).not.toThrow();
  });

  it('should accept non-Latin letters', () => {
    expect(() => assertHeaderLine('имя,цена')).not.toThrow();
  });

  it('should treat a blank line as an empty dataset', () => {
    expect(codeOf(() => assertHeaderLine('  '))).toBe(ErrorCode.EMPTY_DATASET);
  });

  it('should reject a line without letters', () => {
    expect(codeOf(() => assertHeaderLine('1,2,3'))).toBe(ErrorCode.MISSING_HEADER);
    expect(codeOf(() => assertHeaderLine('--,**'))).toBe(ErrorCode.MISSING_HEADER);
  });

  it('should reject a line of numbers even when they contain letters', () => {
    expect(codeOf(() => assertHeaderLine('1e5,inf,nan'))).toBe(ErrorCode.MISSING_HEADER);
  });
});

describe('loadDataset', () => {
  it('should load headers and records in file order', () => {
    const dataset = loadDataset(memorySource(PHONES));
    expect(dataset.headers).toEqual(['name', 'brand', 'price', 'rating']);
    expect(dataset.size).toBe(4);
    expect(dataset.records[0]).toEqual({ name: 'orbit x', brand: 'nova', price: '999', rating: '4.9' });
  });

  it('should pad short rows with empty strings', () => {
    const dataset = loadDataset(memorySource('a,b,c\n1,2'));
    expect(dataset.records[0]).toEqual({ a: '1', b: '2', c: '' });
  });

  it('should reject a header-only input as EMPTY_DATASET', () => {
    expect(codeOf(() => loadDataset(memorySource('name,price')))).toBe(ErrorCode.EMPTY_DATASET);
  });

  it('should reject an all-numeric first line as MISSING_HEADER', () => {
    expect(codeOf(() => loadDataset(memorySource('1,2\n3,4')))).toBe(ErrorCode.MISSING_HEADER);
  });

  it('should reject an empty input as EMPTY_DATASET', () => {
    expect(codeOf(() => loadDataset(memorySource('')))).toBe(ErrorCode.EMPTY_DATASET);
  });

  it('should log the load at debug level', () => {
    const logger = createTestLogger();
    loadDataset(memorySource(PHONES), { logger });
    const [entry] = logger.getLogsByLevel('debug');
    expect(entry?.message).toBe('Dataset loaded');
    expect(entry?.context?.rowsProcessed).toBe(4);
    expect(entry?.context?.source).toBe('memory.csv');
  });

  it('should freeze the loaded data', () => {
    const dataset = loadDataset(memorySource(PHONES));
    expect(Object.isFrozen(dataset.records)).toBe(true);
    expect(Object.isFrozen(dataset.records[0])).toBe(true);
  });
});

describe('Dataset', () => {
  const dataset = loadDataset(memorySource(PHONES));

  describe('validateColumn', () => {
    it('should list the available columns', () => {
      expect(() => dataset.validateColumn('cost')).toThrow(
        "Column 'cost' not found. Available columns: name, brand, price, rating"
      );
    });

    it('should accept known columns', () => {
      expect(dataset.hasColumn('price')).toBe(true);
      expect(() => dataset.validateColumn('price')).not.toThrow();
    });
  });

  describe('filter', () => {
    it('should keep matching records', () => {
      const matched = dataset.filter(createComparison('price', '>', '500'));
      expect(matched.map(r => r.name)).toEqual(['orbit x', 'pulse 5']);
    });

    it('should validate the column first', () => {
      expect(codeOf(() => dataset.filter(createComparison('cost', '>', '1')))).toBe(
        ErrorCode.COLUMN_NOT_FOUND
      );
    });

    it('should log rows processed and matched', () => {
      const logger = createTestLogger();
      const logged = loadDataset(memorySource(PHONES), { logger });
      logger.clear();
      logged.filter(createComparison('brand', '=', 'nova'));
      const [entry] = logger.getLogs();
      expect(entry?.message).toBe('Filter applied');
      expect(entry?.context?.rowsProcessed).toBe(4);
      expect(entry?.context?.rowsMatched).toBe(2);
    });
  });

  describe('aggregate', () => {
    it('should reduce a column', () => {
      expect(dataset.aggregate(createAggregationRequest('price', 'avg'))).toEqual({ result: 674 });
      expect(dataset.aggregate(createAggregationRequest('rating', 'max'))).toEqual({ result: 4.9 });
      expect(dataset.aggregate(createAggregationRequest('name', 'count'))).toEqual({ result: 4 });
    });

    it('should validate the column', () => {
      expect(codeOf(() => dataset.aggregate(createAggregationRequest('cost', 'sum')))).toBe(
        ErrorCode.COLUMN_NOT_FOUND
      );
    });

    it('should yield 0 for an empty dataset without checking the column', () => {
      const empty = Dataset.fromRecords(['price'], []);
      expect(empty.aggregate(createAggregationRequest('cost', 'avg'))).toEqual({ result: 0 });
    });
  });

  describe('sort', () => {
    it('should sort descending by price', () => {
      const sorted = dataset.sort(createSortSpec('price', 'desc'));
      expect(sorted.map(r => r.price)).toEqual(['1199', '999', '299', '199']);
    });

    it('should leave the dataset order alone', () => {
      dataset.sort(createSortSpec('price', 'asc'));
      expect(dataset.records.map(r => r.price)).toEqual(['999', '1199', '199', '299']);
    });
  });

  describe('fromRecords', () => {
    it('should normalise records to the header set', () => {
      const built = Dataset.fromRecords(['a', 'b'], [{ a: '1', extra: 'x' }]);
      expect(built.records).toEqual([{ a: '1', b: '' }]);
    });
  });

  describe('headers that name Object.prototype members', () => {
    const special = Dataset.fromRows(['name', '__proto__', 'constructor'], [
      ['a', '5', 'x'],
      ['b', '7', 'y'],
    ]);

    it('should store every header as an own key', () => {
      expect(Object.keys(special.records[0])).toEqual(['name', '__proto__', 'constructor']);
      expect(Object.hasOwn(special.records[0], '__proto__')).toBe(true);
      expect(special.records[0]['__proto__']).toBe('5');
    });

    it('should filter, aggregate and sort on them', () => {
      expect(special.filter(createComparison('__proto__', '>', '6')).map(r => r.name)).toEqual(['b']);
      expect(special.aggregate(createAggregationRequest('__proto__', 'sum'))).toEqual({ result: 12 });
      expect(special.sort(createSortSpec('__proto__', 'desc')).map(r => r.name)).toEqual(['b', 'a']);
      expect(special.sort(createSortSpec('constructor', 'asc')).map(r => r.name)).toEqual(['a', 'b']);
    });

    it('should keep them through fromRecords', () => {
      const source = Object.fromEntries([['__proto__', '3']]);
      const built = Dataset.fromRecords(['__proto__', 'other'], [source]);
      expect(Object.hasOwn(built.records[0], '__proto__')).toBe(true);
      expect(built.records[0]['__proto__']).toBe('3');
      expect(built.records[0]['other']).toBe('');
    });
  });

  describe('toResult', () => {
    it('should wrap all records by default', () => {
      const result = dataset.toResult();
      expect(result.kind).toBe('records');
      expect(result.headers).toEqual(['name', 'brand', 'price', 'rating']);
      expect(result.records).toHaveLength(4);
    });
  });
});
