import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for the answer quality gate
 *
 * Every test runs in-process: fake oracles, in-memory or `:memory:` SQLite
 * stores and stubbed fetch. Gate logs are limited to errors unless
 * GATE_LOG_LEVEL says otherwise.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      GATE_LOG_LEVEL: process.env.GATE_LOG_LEVEL ?? 'error',
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
      ],
    },
  },
});
