import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cache-kv-store',
    include: ['tests/**/*.test.mts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['src/**/*.mts'],
    },
  },
});
