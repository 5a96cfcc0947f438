/**
 * Vitest Workspace Configuration
 *
 * Each package runs its tests as its own project with shared settings.
 *
 * Workspace Projects:
 * - core: @lexloom/core package tests
 * - cli: @lexloom/cli package tests
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  // Core package (@lexloom/core)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (@lexloom/cli)
  {
    test: {
      name: 'cli',
      globals: true,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
