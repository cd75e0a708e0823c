import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (path: string): string =>
  fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace package aliases so tests run against sources without a build
    alias: [
      { find: /^@plugseal\/kernel$/, replacement: packageSource('kernel/src/index.ts') },
      { find: /^@plugseal\/crypto$/, replacement: packageSource('crypto/src/index.ts') },
      { find: /^@plugseal\/crypto\/testkit$/, replacement: packageSource('crypto/src/testkit.ts') },
      { find: /^@plugseal\/bundle$/, replacement: packageSource('bundle/src/index.ts') },
    ],
  },
  test: {
    root: '.',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
    // Fail fast on first error in CI
    bail: process.env.CI ? 1 : 0,
  },
});
