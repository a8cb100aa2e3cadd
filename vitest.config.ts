import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@snapshot-audit/shared': resolve(__dirname, 'packages/shared/src/index.ts'),
      '@snapshot-audit/adapters': resolve(__dirname, 'packages/adapters/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
