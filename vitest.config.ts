import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger/vitest.config.ts',
      'packages/*/vitest.config.ts',
    ],
  },
});
