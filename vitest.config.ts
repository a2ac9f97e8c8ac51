import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['storefront/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
