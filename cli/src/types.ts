/**
 * @tabq/cli Types
 */

import type { LogLevel, Logger } from '@tabq/core';
import type { OutputConfig, OutputFormat, TabqConfig } from '@tabq/config';

/**
 * Text sinks for the two console streams. Writes are raw: callers add
 * their own line endings.
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Environment to read TABQ_* variables from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Aborted when the user interrupts the run */
  signal?: AbortSignal;
}

/**
 * Parsed command-line flags.
 */
export interface CliFlags {
  where?: string;
  aggregate?: string;
  orderBy?: string;
  format?: OutputFormat;
  logLevel?: LogLevel;
}

export interface CsvFileSourceOptions {
  /** Files larger than this are rejected before they are read */
  maxFileSizeBytes?: number;
}

export type RenderOptions = OutputConfig;

/**
 * Query command options
 */
export interface QueryOptions {
  /** Path to the CSV file */
  file: string;
  where?: string;
  aggregate?: string;
  orderBy?: string;
  config: TabqConfig;
  logger?: Logger;
  /** Stops the command between phases once aborted */
  signal?: AbortSignal;
}

/**
 * Query command result
 */
export interface QueryCommandResult {
  success: boolean;
  /** Process exit status: 0 on success, 1 on any failure */
  exitCode: number;
  /** Rendered result for stdout */
  output?: string;
  /** One-line diagnostic for stderr */
  error?: string;
}
