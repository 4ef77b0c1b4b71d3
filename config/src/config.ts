/**
 * @tabq/config - Configuration Factory Functions
 *
 * Layering, lowest precedence first: DEFAULT_CONFIG, environment variables,
 * explicit overrides (command-line flags).
 */

import { ErrorCode, LOG_LEVELS, LogLevels, ValidationError } from '@tabq/core';
import type { ConfigIssue, DeepPartial, EnvConfigOptions, TabqConfig } from './types.js';
import { isLogFormat, isOutputFormat, LOG_FORMATS, OUTPUT_FORMATS } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Copy of `partial` without keys whose value is undefined, so that an unset
 * override never masks a value underneath it.
 */
function definedOnly<T extends object>(partial: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!partial) {
    return result;
  }
  for (const key in partial) {
    const value = partial[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return obj;
}

/**
 * Create a complete, frozen TabqConfig.
 *
 * @param overrides - Values that win over `base`
 * @param base - Starting point (defaults to DEFAULT_CONFIG)
 *
 * @example
 * ```typescript
 * const config = createConfig({ output: { format: 'simple' } });
 * config.output.emptyMessage; // 'No results found.'
 * ```
 */
export function createConfig(
  overrides: DeepPartial<TabqConfig> = {},
  base: TabqConfig = DEFAULT_CONFIG
): TabqConfig {
  return deepFreeze({
    input: { ...base.input, ...definedOnly(overrides.input) },
    output: { ...base.output, ...definedOnly(overrides.output) },
    observability: { ...base.observability, ...definedOnly(overrides.observability) },
  });
}

/**
 * Merge partial configurations; later arguments take precedence.
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<TabqConfig> | null | undefined>
): DeepPartial<TabqConfig> {
  const result: DeepPartial<TabqConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    if (config.input) {
      result.input = { ...result.input, ...definedOnly(config.input) };
    }
    if (config.output) {
      result.output = { ...result.output, ...definedOnly(config.output) };
    }
    if (config.observability) {
      result.observability = { ...result.observability, ...definedOnly(config.observability) };
    }
  }

  return result;
}

function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  return env[[prefix, ...parts].join('_').toUpperCase()];
}

/**
 * Overrides read from the environment, plus any variables that held
 * unusable values.
 */
export interface EnvOverrides {
  overrides: DeepPartial<TabqConfig>;
  issues: ConfigIssue[];
}

/**
 * Read configuration overrides from environment variables named
 * `<PREFIX>_<SECTION>_<FIELD>`:
 *
 * - TABQ_INPUT_MAX_FILE_SIZE_BYTES
 * - TABQ_OUTPUT_FORMAT
 * - TABQ_OUTPUT_EMPTY_MESSAGE
 * - TABQ_OBSERVABILITY_LOG_LEVEL
 * - TABQ_OBSERVABILITY_LOG_FORMAT
 */
export function getEnvOverrides(options: EnvConfigOptions = {}): EnvOverrides {
  const prefix = options.prefix ?? 'TABQ';
  const env = options.env ?? process.env;
  const overrides: DeepPartial<TabqConfig> = {};
  const issues: ConfigIssue[] = [];

  const variable = (...parts: string[]) => ({
    name: [prefix, ...parts].join('_').toUpperCase(),
    value: getEnvVar(env, prefix, ...parts),
  });

  const maxSize = variable('INPUT', 'MAX', 'FILE', 'SIZE', 'BYTES');
  if (maxSize.value !== undefined) {
    const maxFileSizeBytes = Number(maxSize.value);
    if (maxSize.value.trim() === '' || Number.isNaN(maxFileSizeBytes)) {
      issues.push({ path: maxSize.name, message: 'Expected a number of bytes', value: maxSize.value });
    } else {
      overrides.input = { maxFileSizeBytes };
    }
  }

  const format = variable('OUTPUT', 'FORMAT');
  if (format.value !== undefined) {
    if (isOutputFormat(format.value)) {
      overrides.output = { ...overrides.output, format: format.value };
    } else {
      issues.push({
        path: format.name,
        message: 'Unknown output format',
        value: format.value,
        suggestion: `Use one of: ${OUTPUT_FORMATS.join(', ')}`,
      });
    }
  }

  const emptyMessage = variable('OUTPUT', 'EMPTY', 'MESSAGE');
  if (emptyMessage.value !== undefined) {
    overrides.output = { ...overrides.output, emptyMessage: emptyMessage.value };
  }

  const logLevel = variable('OBSERVABILITY', 'LOG', 'LEVEL');
  if (logLevel.value !== undefined) {
    if (LogLevels.isLogLevel(logLevel.value)) {
      overrides.observability = { ...overrides.observability, logLevel: logLevel.value };
    } else {
      issues.push({
        path: logLevel.name,
        message: 'Unknown log level',
        value: logLevel.value,
        suggestion: `Use one of: ${LOG_LEVELS.join(', ')}`,
      });
    }
  }

  const logFormat = variable('OBSERVABILITY', 'LOG', 'FORMAT');
  if (logFormat.value !== undefined) {
    if (isLogFormat(logFormat.value)) {
      overrides.observability = { ...overrides.observability, logFormat: logFormat.value };
    } else {
      issues.push({
        path: logFormat.name,
        message: 'Unknown log format',
        value: logFormat.value,
        suggestion: `Use one of: ${LOG_FORMATS.join(', ')}`,
      });
    }
  }

  return { overrides, issues };
}

/**
 * Create a configuration from defaults plus environment overrides.
 *
 * @throws ValidationError (INVALID_CONFIG) when a variable holds an unusable value
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): TabqConfig {
  const { overrides, issues } = getEnvOverrides(options);
  if (issues.length > 0) {
    throw configError(issues);
  }
  return createConfig(overrides);
}

/**
 * Wrap configuration issues in a ValidationError, one issue per message line.
 */
export function configError(issues: readonly ConfigIssue[]): ValidationError {
  const lines = issues.map(issue => `${issue.path}: ${issue.message} (got ${JSON.stringify(issue.value)})`);
  return new ValidationError(
    `Invalid configuration:\n  ${lines.join('\n  ')}`,
    ErrorCode.INVALID_CONFIG,
    { issues: issues.map(issue => ({ path: issue.path, message: issue.message })) }
  );
}
