import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: [
      // Unit tests in packages
      'packages/**/src/**/__tests__/**/*.test.ts',
    ],
    exclude: ['node_modules/', 'dist/', '**/node_modules/**'],
  },
  resolve: {
    alias: {
      '@stagegate/lib-core': path.resolve(__dirname, 'packages/lib-core/src'),
      '@stagegate/policy-core': path.resolve(__dirname, 'packages/policy-core/src'),
      '@stagegate/workflow-core': path.resolve(__dirname, 'packages/workflow-core/src'),
    },
  },
});
