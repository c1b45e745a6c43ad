import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package aliases so tests run against sources, no build needed
      '@tillwire/schema': `${root}packages/schema/src/index.ts`,
    },
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/__tests__/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
