import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'node/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['node/tests/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
