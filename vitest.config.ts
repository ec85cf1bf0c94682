import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'tools/logger',
      'packages/model',
      'packages/shared',
      'packages/document-analyzer',
    ],
    coverage: {
      provider: 'v8',
      reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts', 'tools/logger/src/**/*.ts'],
      exclude: ['**/index.ts', '**/*.test.ts', '**/testing/**'],
    },
  },
});
