import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';

const rootDir = fileURLToPath(new URL('./', import.meta.url));
const packagesDir = join(rootDir, 'packages');

export default defineConfig({
  resolve: {
    alias: {
      '@ppactl/contracts/schema': join(packagesDir, 'ppactl-contracts/src/schema.ts'),
      '@ppactl/contracts': join(packagesDir, 'ppactl-contracts/src/index.ts'),
      '@ppactl/core': join(packagesDir, 'ppactl-core/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
