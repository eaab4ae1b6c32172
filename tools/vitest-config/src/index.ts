import type { UserConfig } from 'vitest/config';

/**
 * @param coverageInclude - Source globs measured by coverage, relative to the config file
 */
export const defineConfig = (
  options: UserConfig = {},
  coverageInclude: string[] = ['src/**/*.ts'],
): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: coverageInclude,
        exclude: ['**/index.ts', '**/*.test.ts'],
        thresholds: {
          lines: 95,
          functions: 95,
          branches: 90,
          statements: 95,
        },
      },
      ...options.test,
    },
  };
};
