import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/index.ts', '**/types.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
