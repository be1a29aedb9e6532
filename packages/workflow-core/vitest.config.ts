import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['../../test/setup.ts'],
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@stagegate/lib-core': path.resolve(__dirname, '../lib-core/src'),
      '@stagegate/policy-core': path.resolve(__dirname, '../policy-core/src'),
      '@stagegate/workflow-core': path.resolve(__dirname, '../workflow-core/src'),
    },
  },
});
