import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./${pkg}/src/index.ts`, import.meta.url));

/**
 * Runs the unit tests of every workspace package against their TypeScript
 * sources.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@quarry/core': source('core'),
      '@quarry/locks': source('locks'),
      '@quarry/config': source('config'),
      '@quarry/test-utils': source('test-utils'),
    },
  },
  test: {
    include: ['*/src/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**', 'test-utils/**'],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
