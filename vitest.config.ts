import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

const baseConfig = defineBaseConfig({
  test: {
    include: [
      'tools/*/src/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
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
      include: [
        'tools/*/src/**/*.ts',
        'packages/*/src/**/*.ts',
        'apps/*/src/**/*.ts',
      ],
      exclude: ['**/index.ts', '**/*.test.ts', 'apps/worker/src/main.ts'],
    },
  },
});
