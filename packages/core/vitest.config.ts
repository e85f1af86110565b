import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.{test,spec}.ts'],
    // Property tests draw many rows per case
    testTimeout: 10000,
  },
});
