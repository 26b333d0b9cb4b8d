import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const sharedSrc = fileURLToPath(new URL('./apps/ts/packages/shared/src', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/ts/packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: [
      {
        find: /^@stock-warehouse\/shared\/(.*)$/,
        replacement: `${sharedSrc}/$1`,
      },
      { find: '@stock-warehouse/shared', replacement: sharedSrc },
    ],
  },
});
