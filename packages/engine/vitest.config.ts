import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    include: ['src/**/*.test.ts'],
    fileParallelism: false,
  },
  resolve: {
    alias: {
      'perception-shared': fileURLToPath(new URL('../shared/src/index.ts', import.meta.url)),
    },
  },
});
