import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/artifact-store/vitest.config.ts',
  'packages/sandbox/vitest.config.ts',
  'apps/service/vitest.config.ts'
]);
