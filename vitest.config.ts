import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
    benchmark: {
      include: ['benchmarks/**/*.bench.ts'],
    },
  },
  resolve: {
    alias: {
      '@pgsession/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@pgsession/postgresql': fileURLToPath(
        new URL('./packages/postgresql/src/index.ts', import.meta.url),
      ),
    },
  },
});
