import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
    },
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@classifier-runtime/shared': fileURLToPath(
        new URL('./src/backend/shared/src/index.ts', import.meta.url)
      ),
    },
  },
});
