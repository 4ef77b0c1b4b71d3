/**
 * @tabq/config - Default Configuration Values
 */

import type { TabqConfig } from './types.js';

/** 256 MiB */
export const DEFAULT_MAX_FILE_SIZE_BYTES = 256 * 1024 * 1024;

/**
 * Defaults used when neither the environment nor the command line says otherwise.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@tabq/config';
 *
 * DEFAULT_CONFIG.output.format; // 'grid'
 * const config = createConfig({ output: { format: 'json' } });
 * ```
 */
export const DEFAULT_CONFIG: TabqConfig = {
  input: {
    maxFileSizeBytes: DEFAULT_MAX_FILE_SIZE_BYTES,
  },
  output: {
    format: 'grid',
    emptyMessage: 'No results found.',
  },
  observability: {
    logLevel: 'warn',
    logFormat: 'pretty',
  },
};
