import type { UserConfig } from 'vitest/config';

/**
 * Shared vitest settings for every workspace package.
 *
 * Each package's `vitest.config.ts` calls this so the root `vitest run`
 * picks them up as projects with identical behaviour.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['src/**/*.test.ts', '**/index.ts'],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 85,
          statements: 90,
        },
      },
      ...options.test,
    },
  };
};
