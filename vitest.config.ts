import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // Never reach the real Anthropic API from tests
    alias: {
      '@anthropic-ai/sdk': './tests/mocks/anthropic.ts',
    },
  },
});
