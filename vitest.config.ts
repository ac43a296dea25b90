import { defineConfig } from 'vitest/config';
import { sharedVitestConfig } from './packages/vitest-config/src/index.js';

export default defineConfig({
  test: {
    ...sharedVitestConfig.test,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      ...sharedVitestConfig.test.coverage,
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/vitest-config/**',
        'packages/cli/src/bin.ts',
        'packages/core/src/types/**/*.ts',
      ],
    },
  },
});
