import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (p: string) => fileURLToPath(new URL(`./packages/${p}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@roster/core/db': src('core/src/db/index.ts'),
      '@roster/core/repos': src('core/src/repos/index.ts'),
      '@roster/core/services': src('core/src/services/index.ts'),
      '@roster/core': src('core/src/index.ts'),
      '@roster/sqlite': src('sqlite/src/index.ts'),
    },
  },
  test: {
    testTimeout: 30000,
    include: ['packages/*/src/test/**/*.test.ts'],
  },
});
