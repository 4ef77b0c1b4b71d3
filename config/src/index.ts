/**
 * @tabq/config - Configuration for tabq
 *
 * One configuration object shared by the CLI and anything embedding the
 * engine. Values come from defaults, then `TABQ_*` environment variables,
 * then explicit overrides.
 *
 * @example
 * ```typescript
 * import { createConfig, getEnvOverrides, mergeConfigs, validateConfig } from '@tabq/config';
 *
 * const { overrides } = getEnvOverrides();
 * const config = createConfig(mergeConfigs(overrides, { output: { format: 'json' } }));
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @tabq/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  DeepPartial,
  InputConfig,
  OutputFormat,
  OutputConfig,
  LogFormat,
  ObservabilityConfig,
  TabqConfig,
  ConfigIssue,
  ConfigValidationResult,
  EnvConfigOptions,
} from './types.js';

export { OUTPUT_FORMATS, LOG_FORMATS, isOutputFormat, isLogFormat } from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG, DEFAULT_MAX_FILE_SIZE_BYTES } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export {
  createConfig,
  mergeConfigs,
  getEnvOverrides,
  getConfigFromEnv,
  configError,
} from './config.js';

export type { EnvOverrides } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';
