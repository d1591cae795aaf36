import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    // Integration tests change the working directory, which worker threads reject.
    pool: 'forks',
    testTimeout: 10000,
  },
});
