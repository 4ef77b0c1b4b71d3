/**
 * @tabq/cli
 *
 * Command-line front end for @tabq/core: CSV decoding, table rendering and
 * argument handling.
 *
 * @packageDocumentation
 */

export { runCli, createProgram, resolveConfig, VERSION } from './program.js';
export { queryCommand, describeFailure } from './commands/query.js';
export { CsvFileSource, createCsvFileSource } from './csv-source.js';
export { renderResult } from './render.js';

export type {
  CliIO,
  CliFlags,
  CsvFileSourceOptions,
  RenderOptions,
  QueryOptions,
  QueryCommandResult,
} from './types.js';
