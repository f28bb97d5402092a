import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // Route tests bind real HTTP servers on ephemeral ports.
    fileParallelism: false,
  },
});
