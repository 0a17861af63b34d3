import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // sharp is a native addon, load it in forked workers
    pool: 'forks',
    testTimeout: 20000,
  },
});
