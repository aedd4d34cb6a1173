import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

const baseConfig = defineBaseConfig({
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'tools/*/src/**/*.test.ts',
    ],
  },
});

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    coverage: {
      ...baseConfig.test?.coverage,
      provider: 'v8',
      include: ['packages/*/src/**/*.ts', 'tools/logger/src/**/*.ts'],
      exclude: [
        '**/index.ts',
        '**/*.test.ts',
        '**/__fixtures__/**',
        'packages/model/src/**', // Type definitions only
      ],
    },
  },
});
