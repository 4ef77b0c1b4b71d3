/**
 * @tabq/config - Type Definitions
 *
 * Naming conventions:
 * - sizes end in *Bytes
 * - enumerated choices are string literal unions
 *
 * @module @tabq/config
 */

import type { LogLevel } from '@tabq/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Sections
// =============================================================================

/**
 * Input handling.
 */
export interface InputConfig {
  /** Files larger than this are rejected before decoding */
  maxFileSizeBytes: number;
}

export const OUTPUT_FORMATS = ['grid', 'simple', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Result rendering.
 *
 * @example
 * ```typescript
 * const output: OutputConfig = { format: 'simple', emptyMessage: 'Nothing matched.' };
 * ```
 */
export interface OutputConfig {
  /** Table layout */
  format: OutputFormat;
  /** Printed instead of a table when a records result is empty */
  emptyMessage: string;
}

export const LOG_FORMATS = ['json', 'pretty'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

export function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;
  /** Log line format */
  logFormat: LogFormat;
}

/**
 * Complete tabq configuration.
 */
export interface TabqConfig {
  input: InputConfig;
  output: OutputConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

export interface ConfigIssue {
  /** Path to the field, e.g. 'output.format' */
  path: string;
  message: string;
  value: unknown;
  suggestion?: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}

// =============================================================================
// Environment
// =============================================================================

export interface EnvConfigOptions {
  /** Variable prefix (default: 'TABQ') */
  prefix?: string;
  /** Environment to read (default: process.env) */
  env?: Record<string, string | undefined>;
}
