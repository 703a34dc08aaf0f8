import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@deep-research\/domain\/(.*)$/,
        replacement: fromRoot('./packages/domain/src/$1/index.ts'),
      },
      {
        find: /^@deep-research\/research-tools-sdk$/,
        replacement: fromRoot('./packages/research-tools-sdk/src/index.ts'),
      },
    ],
  },
  test: {
    include: [
      'packages/*/__tests__/**/*.test.ts',
      'apps/*/__tests__/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 30000,
  },
});
