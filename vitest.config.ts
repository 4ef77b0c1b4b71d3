import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

/**
 * Shared Vitest Configuration
 *
 * Extended by every project in vitest.workspace.ts. Workspace package names
 * resolve to their TypeScript sources so tests never need a build first.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@tabq/core': fromRoot('./core/src/index.ts'),
      '@tabq/config': fromRoot('./config/src/index.ts'),
      '@tabq/cli': fromRoot('./cli/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    fileParallelism: false,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: ['**/dist/**', '**/__tests__/**'],
    },
  },
});
