import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/fixtures/vitest.config.ts',
  'packages/extractor/vitest.config.ts',
  'packages/record-store/vitest.config.ts',
  'apps/service/vitest.config.ts'
]);
