import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(root, 'node/src'),
    },
  },
  test: {
    include: ['node/tests/**/*.test.ts'],
    environment: 'node',
  },
});
