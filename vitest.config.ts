import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Keep the real project .env out of unit tests.
  envDir: 'test/env',
  test: {
    environment: 'node',
    globals: true,
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    isolate: true,
    fileParallelism: false,
    clearMocks: true,
  },
});
