import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

// Workspace packages are tested from their TypeScript sources
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@polyparse/core': source('./packages/core/src/index.ts'),
      '@polyparse/riscv': source('./packages/riscv/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
  },
});
