import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      '@errata/core': path.resolve(rootDir, 'packages/core/src'),
      '@errata/llm': path.resolve(rootDir, 'packages/llm/src'),
      '@errata/shared': path.resolve(rootDir, 'packages/shared/src'),
    },
  },
});
