import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * abiseed test configuration
 *
 * - One run covers every workspace package
 * - No retries, to surface nondeterminism immediately
 * - Property tests use fixed seeds; TEST_SEED is the shared default
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool: 'forks',

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    retry: 0,
    fileParallelism: !isCI,

    // Property-based suites run a few hundred cases each
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
    },
  },
});
