import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@searchgate/shared': `${packagesDir}/shared`,
      '@searchgate/schemas': `${packagesDir}/schemas`,
      '@searchgate/core': `${packagesDir}/core`,
      '@searchgate/api': `${packagesDir}/api`,
    },
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['packages/*/src/**/*.integration.test.ts', 'node_modules'],
  },
});
