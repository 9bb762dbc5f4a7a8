import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['tmp/**', 'node_modules/**', 'dist/**'],
    // Render tests spawn real subprocesses.
    testTimeout: 15_000,
  },
});
