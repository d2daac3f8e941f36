import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test discovery
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',
    globals: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],

      // Core subsystem only, the CLI is a thin shell over it
      include: ['src/lib/**/*.ts', 'src/utils/**/*.ts'],

      exclude: [
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        '**/tests/**',
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,

        'src/lib/selection-engine.ts': {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
        'src/lib/directory-cache.ts': {
          lines: 90,
          functions: 85,
          branches: 85,
          statements: 90,
        },
      },
    },

    // Setup file
    setupFiles: ['./tests/setup.ts'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
