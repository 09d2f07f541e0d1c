import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration
 *
 * Each package carries its own vitest.config.ts; this file only fans out to
 * them so that a single `vitest run` at the root covers the whole tree.
 */
export default defineConfig({
  test: {
    projects: ['packages/*'],
    // Property-based suites run a few hundred cases each
    testTimeout: 10000,
    reporters: ['default'],
  },
});
