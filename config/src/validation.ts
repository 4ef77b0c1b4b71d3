/**
 * @tabq/config - Configuration Validation
 *
 * Checks a fully resolved configuration. Errors make the configuration
 * unusable; warnings are reported but do not stop a run.
 */

import { LOG_LEVELS, LogLevels } from '@tabq/core';
import type { ConfigIssue, ConfigValidationResult, TabqConfig } from './types.js';
import { isLogFormat, isOutputFormat, LOG_FORMATS, OUTPUT_FORMATS } from './types.js';

/** Above this size a whole-file read is likely to hurt. */
const LARGE_FILE_WARNING_BYTES = 512 * 1024 * 1024;

/**
 * Validate a complete TabqConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   throw configError(result.errors);
 * }
 * ```
 */
export function validateConfig(config: TabqConfig): ConfigValidationResult {
  const errors: ConfigIssue[] = [];
  const warnings: ConfigIssue[] = [];

  validateInputConfig(config.input, errors, warnings);
  validateOutputConfig(config.output, errors);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateInputConfig(
  input: TabqConfig['input'],
  errors: ConfigIssue[],
  warnings: ConfigIssue[]
): void {
  const { maxFileSizeBytes } = input;

  if (!Number.isFinite(maxFileSizeBytes) || maxFileSizeBytes <= 0) {
    errors.push({
      path: 'input.maxFileSizeBytes',
      message: 'Max file size must be a positive number',
      value: maxFileSizeBytes,
    });
    return;
  }

  if (maxFileSizeBytes > LARGE_FILE_WARNING_BYTES) {
    warnings.push({
      path: 'input.maxFileSizeBytes',
      message: 'Max file size exceeds 512MB; the whole file is held in memory',
      value: maxFileSizeBytes,
      suggestion: 'Split large inputs or lower the limit',
    });
  }
}

function validateOutputConfig(output: TabqConfig['output'], errors: ConfigIssue[]): void {
  if (!isOutputFormat(output.format)) {
    errors.push({
      path: 'output.format',
      message: 'Unknown output format',
      value: output.format,
      suggestion: `Use one of: ${OUTPUT_FORMATS.join(', ')}`,
    });
  }
}

function validateObservabilityConfig(
  observability: TabqConfig['observability'],
  errors: ConfigIssue[]
): void {
  if (!LogLevels.isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Unknown log level',
      value: observability.logLevel,
      suggestion: `Use one of: ${LOG_LEVELS.join(', ')}`,
    });
  }

  if (!isLogFormat(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: 'Unknown log format',
      value: observability.logFormat,
      suggestion: `Use one of: ${LOG_FORMATS.join(', ')}`,
    });
  }
}
