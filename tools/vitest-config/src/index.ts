import type { UserConfig } from 'vitest/config';

type TestConfig = NonNullable<UserConfig['test']>;

/** Source globs, relative to the directory vitest runs from */
const SOURCE_GLOBS = [
  'tools/*/src/**/*.ts',
  'packages/*/src/**/*.ts',
  'apps/*/src/**/*.ts',
];

/**
 * Build the shared Vitest configuration.
 *
 * `options.test` is merged over the defaults; every other key replaces the
 * default outright.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const test: TestConfig = {
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
      include: SOURCE_GLOBS,
      exclude: ['**/*.test.ts', '**/index.ts', '**/main.ts'],
    },
    ...options.test,
  };

  return {
    ...options,
    test,
  };
};
