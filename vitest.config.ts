import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['delphix/typescript/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
