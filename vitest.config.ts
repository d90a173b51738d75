import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts', 'shared/**/*.test.ts'],
  },
});
