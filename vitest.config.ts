/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Environment configuration
    environment: 'node',

    // Test file patterns
    include: ['**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],

    // ES modules support
    globals: false, // Explicit imports for better tree-shaking

    // Test execution
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
      },
    },

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['coverage/**', 'dist/**', 'test/**', '**/*.d.ts', '**/*.test.ts', 'vitest.config.ts'],
    },

    // Timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    watch: false,

    setupFiles: ['./test/setup.ts'],

    allowOnly: !process.env.CI,
    passWithNoTests: false,
    isolate: true,

    // TypeScript configuration
    typecheck: {
      enabled: false, // tsc runs separately
    },
  },
});
