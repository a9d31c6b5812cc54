import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'service',
    environment: 'node'
  },
  resolve: {
    alias: {
      '@shopscout/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@shopscout/extractor': resolve(__dirname, '../../packages/extractor/src/index.ts'),
      '@shopscout/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts'),
      '@shopscout/record-store': resolve(__dirname, '../../packages/record-store/src/index.ts')
    }
  }
});
