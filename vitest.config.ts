import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    // Full four-card searches score hundreds of thousands of hands
    testTimeout: 60_000,
  },
});
