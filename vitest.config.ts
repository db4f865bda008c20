import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Runs the tests of every workspace package from the root.
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/__tests__/**/*.test.ts',
      'apps/*/src/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
