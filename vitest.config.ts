import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    passWithNoTests: false,
  },
  resolve: {
    alias: {
      '@shared': path.resolve(rootDir, 'packages/shared/src'),
    },
  },
});
