import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Resolve the workspace package to its sources so tests need no build
      '@runplane/shared': fileURLToPath(new URL('../shared/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'server',
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: process.env.CI ? 60000 : 30000,
    hookTimeout: process.env.CI ? 60000 : 30000,
    reporters: ['default'],
  },
});
