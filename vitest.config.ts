import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/test/unit/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
