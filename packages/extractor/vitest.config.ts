import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'extractor',
    environment: 'node'
  },
  resolve: {
    alias: {
      '@shopscout/core': resolve(__dirname, '../core/src/index.ts'),
      '@shopscout/fixtures': resolve(__dirname, '../fixtures/src/index.ts')
    }
  }
});
