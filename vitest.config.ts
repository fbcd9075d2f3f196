import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@keyspace/storage': path.resolve(rootDir, 'packages/storage/src/index.ts'),
      '@keyspace/vfs': path.resolve(rootDir, 'packages/vfs/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    isolate: true,
    setupFiles: ['./vitest.global.setup.ts'],
    testTimeout: 15_000,
    hookTimeout: 30_000,
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'services/**/src/tests/**/*.test.ts'
    ],
    exclude: ['**/node_modules/**', '**/dist/**']
  }
});
