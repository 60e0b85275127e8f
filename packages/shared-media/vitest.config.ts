/**
 * Workspace-level Vitest config for @memefeed/shared-media
 *
 * WHY: The root config's include patterns are relative and don't resolve
 *      when vitest runs with this directory as CWD.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
