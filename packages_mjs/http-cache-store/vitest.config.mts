import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'http-cache-store',
    include: ['tests/**/*.test.mts'],
    environment: 'node',
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['src/**/*.mts'],
    },
  },
});
