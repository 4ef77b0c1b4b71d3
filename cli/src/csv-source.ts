/**
 * @tabq/cli CSV File Source
 *
 * Reads a UTF-8 CSV file from disk and exposes it to the core as a
 * TabularSource.
 */

import { readFileSync, statSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import { DecodingError, ErrorCode, NotFoundError, ValidationError } from '@tabq/core';
import type { TabularSource } from '@tabq/core';
import type { CsvFileSourceOptions } from './types.js';

const LINE_BREAK = /\r\n|\r|\n/;

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

function isStringRows(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'))
  );
}

/**
 * TabularSource over a file on disk. The file is read and decoded on first
 * access; both accessors share the decoded text.
 */
export class CsvFileSource implements TabularSource {
  readonly location: string;
  private readonly maxFileSizeBytes: number;
  private text: string | undefined;

  constructor(path: string, options: CsvFileSourceOptions = {}) {
    this.location = path;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? Number.POSITIVE_INFINITY;
  }

  firstLine(): string {
    return this.decode().split(LINE_BREAK, 1)[0] ?? '';
  }

  rows(): string[][] {
    let parsed: unknown;
    try {
      parsed = parse(this.decode(), {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        relax_quotes: true,
      });
    } catch (error) {
      throw new ValidationError(
        `Malformed CSV in ${this.location}: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.INVALID_FORMAT,
        { source: this.location }
      );
    }
    if (!isStringRows(parsed)) {
      throw new ValidationError(
        `Malformed CSV in ${this.location}`,
        ErrorCode.INVALID_FORMAT,
        { source: this.location }
      );
    }
    return parsed;
  }

  private decode(): string {
    if (this.text === undefined) {
      this.text = this.read();
    }
    return this.text;
  }

  private read(): string {
    let bytes: Buffer;
    try {
      const { size } = statSync(this.location);
      if (size > this.maxFileSizeBytes) {
        throw new ValidationError(
          `File too large: ${this.location} (${size} bytes, limit ${this.maxFileSizeBytes})`,
          ErrorCode.INVALID_FORMAT,
          { source: this.location, sizeBytes: size, maxFileSizeBytes: this.maxFileSizeBytes },
          'Raise TABQ_INPUT_MAX_FILE_SIZE_BYTES or split the file'
        );
      }
      bytes = readFileSync(this.location);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw NotFoundError.file(this.location);
      }
      throw error;
    }

    try {
      // fatal: reject invalid sequences; a leading byte-order mark is dropped
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      throw DecodingError.notUtf8(this.location);
    }
  }
}

/**
 * Open `path` as a tabular source. Nothing is read until the core asks.
 *
 * @example
 * ```typescript
 * const dataset = loadDataset(createCsvFileSource('phones.csv'));
 * ```
 */
export function createCsvFileSource(path: string, options: CsvFileSourceOptions = {}): CsvFileSource {
  return new CsvFileSource(path, options);
}
