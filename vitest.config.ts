import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    environment: 'node',
    include: ['state-store/**/*.test.ts', 'src/**/*.test.{ts,tsx}'],
  },
});
