import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core-service/test/**/*.test.ts', 'rewards-service/test/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
