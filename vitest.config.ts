import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      SF_DATAOPS_LOG_LEVEL: 'silent',
    },
    testTimeout: 30000,
  },
});
