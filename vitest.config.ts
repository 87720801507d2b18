import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

/**
 * Single test run over every workspace package.
 * Workspace imports resolve to TypeScript sources, so no build is needed first.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  resolve: {
    alias: {
      '@formcodec/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries: surface flaky property runs immediately
    retry: 0,
    // Property-based suites run a few hundred cases per property
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
