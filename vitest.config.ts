import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'farm-profiles',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
    env: {
      LOG_LEVEL: 'warn',
    },
  },
});
