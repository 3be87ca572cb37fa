import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@record-tree/core': fileURLToPath(
        new URL('./packages/record-tree-core/src/public-api.ts', import.meta.url),
      ),
      '@record-tree/explorer': fileURLToPath(
        new URL('./packages/record-tree-explorer/src/public-api.ts', import.meta.url),
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts'],
    restoreMocks: true,
  },
});
