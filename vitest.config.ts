import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [ 'tests/**/*.test.ts' ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    setupFiles: [ 'tests/vitest.setup.ts' ],
    globals: true,
    testTimeout: 15_000,
  },
});
