import { configDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      exclude: [...configDefaults.exclude, '**/index.ts/**', '**/*.d.ts/**', '**/*test*/**'],
      reporter: ['html'],
    },
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
