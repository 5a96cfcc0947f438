/**
 * Root Vitest configuration.
 *
 * Coverage is a root-level setting in Vitest (projects cannot set it), so
 * the per-package coverage settings live here; the projects themselves are
 * defined in vitest.workspace.ts.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/core/src/**/*.ts', 'packages/cli/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
