import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@libs/resilience': path.resolve(repoRoot, 'libs/resilience/src/index.ts'),
  '@libs/rate-limiter': path.resolve(repoRoot, 'libs/rate-limiter/src/index.ts'),
  '@libs/market-cache': path.resolve(repoRoot, 'libs/market-cache/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
