import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
  },
  resolve: {
    alias: {
      // Run against core sources; dist/ only exists after a build
      '@rowsmith/core': fileURLToPath(
        new URL('../core/src/index.ts', import.meta.url)
      ),
    },
  },
});
