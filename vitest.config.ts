import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig(
    {
      test: {
        include: ['tools/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
      },
    },
    ['tools/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
  ),
);
