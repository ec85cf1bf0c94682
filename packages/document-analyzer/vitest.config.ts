import { defineConfig as defineBaseConfig } from '@docsense/vitest-config';
import { defineConfig } from 'vitest/config';

export default defineConfig(
  defineBaseConfig({
    test: { name: 'document-analyzer' },
  }),
);
