import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration
 *
 * Each package under packages/ is a Vitest project with its own
 * vitest.config.ts; this file only wires them together and pins the
 * settings that must hold for the whole run.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // Monorepo: every package is a project
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },
  },
});
