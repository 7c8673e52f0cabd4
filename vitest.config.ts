/**
 * Vitest Configuration for release-sync
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 10000,

    // Keep engine warnings out of the test output
    env: {
      RELEASE_SYNC_LOG_LEVEL: 'error',
    },

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    // Environment
    environment: 'node',
  },
});
