import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Database tests write into per-test temp dirs and toggle process.env flags.
    fileParallelism: false,
  },
});
