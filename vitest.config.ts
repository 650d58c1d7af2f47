/**
 * Vitest Configuration
 * @module vitest.config
 *
 * Test configuration for the clean-room benchmark orchestrator.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    globals: true,
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/*.d.ts'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 30000,
    hookTimeout: 30000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['**/index.ts', 'src/types/**/*.ts', 'src/bench-app/server.ts', 'tests/**/*.ts'],
    },

    // Sequence configuration
    sequence: {
      shuffle: false,
      concurrent: false,
    },

    // Mock configuration
    clearMocks: true,
  },

  esbuild: {
    target: 'node20',
  },
});
