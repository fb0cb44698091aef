import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  resolve: {
    alias: {
      '@pushgate/sdk': path.resolve(__dirname, 'sdk/src/index.ts'),
    },
  },
  test: {
    include: ['cli/tests/**/*.test.ts', 'sdk/tests/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
