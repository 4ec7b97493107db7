import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bundlehub/fhir-validator': resolve(root, 'packages/fhir-validator/src/index.ts'),
      '@bundlehub/orchestration': resolve(root, 'packages/orchestration/src/index.ts'),
      '@bundlehub/queue': resolve(root, 'packages/queue/src/index.ts'),
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'services/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
    globals: false,
  },
});
