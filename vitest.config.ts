import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@docgate/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    server: {
      deps: {
        external: ['web-tree-sitter'],
      },
    },
    include: ['packages/*/src/**/*.test.ts'],
  },
});
