import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@verita\/([^/]+)\/src\/(.*)\.js$/,
        replacement: `${packagesDir}/$1/src/$2.ts`,
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
  },
});
