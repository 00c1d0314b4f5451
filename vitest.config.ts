import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for sourcewise
 *
 * Tests use in-process stand-ins only (fake providers, :memory: SQLite,
 * stubbed fetch). better-sqlite3 is a native addon, so tests run in forked workers.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
        isolate: true,
      },
    },
  },
});
