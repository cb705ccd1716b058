import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const coreEntry = fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: [{ find: /^@fincalc\/core$/, replacement: coreEntry }],
  },
});
