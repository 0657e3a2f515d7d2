import { defineConfig } from 'vitest/config';

// biome-ignore lint/style/noDefaultExport: vitest requires default export
export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 15_000,
  },
});
