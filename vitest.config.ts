import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: { NO_COLOR: '1' },
  },
});
