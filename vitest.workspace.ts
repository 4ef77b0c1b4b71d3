/**
 * Vitest Workspace Configuration
 *
 * Two strata:
 * - unit: fast, isolated tests (*.unit.test.ts)
 * - integration: tests over real files and the full CLI (*.integration.test.ts)
 *
 * Usage:
 *   npm run test:unit
 *   npm run test:integration
 */
export default [
  {
    extends: './vitest.config.ts',
    test: {
      name: 'unit',
      include: ['*/src/__tests__/**/*.unit.test.ts'],
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'integration',
      include: ['*/src/__tests__/**/*.integration.test.ts'],
    },
  },
];
