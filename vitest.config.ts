import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['packages/*'],
    coverage: {
      provider: 'v8',
      exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts', '**/test/**'],
      include: ['packages/*/src/**/*.ts'],
      thresholds: {
        functions: 85,
        lines: 80,
        branches: 80,
      },
    },
  },
});
