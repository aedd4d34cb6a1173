import type { UserConfig } from 'vitest/config';

export const defineConfig = (options: UserConfig = {}): UserConfig => {
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
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
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
