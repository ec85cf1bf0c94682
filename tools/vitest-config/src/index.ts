import type { UserConfig } from 'vitest/config';

/**
 * Base Vitest configuration shared by every workspace.
 *
 * Each workspace passes its project name and any overrides; `test` options
 * are merged one level deep so overrides never drop the shared defaults.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;

  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      ...test,
    },
  };
};
