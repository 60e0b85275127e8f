/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * WHY: `npm test` at the root runs every workspace's unit tests in one pass.
 * HOW: Discovers tests in packages/ and apps/; packages keep their own config
 *      for running from inside the workspace directory.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts', 'apps/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
