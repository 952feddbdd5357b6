import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages_mjs/*/tests/**/*.test.mts'],
    globals: false,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['packages_mjs/*/src/**/*.mts'],
    },
  },
});
