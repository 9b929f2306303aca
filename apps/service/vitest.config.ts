import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node'
  },
  resolve: {
    alias: {
      '@scrapeyard/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@scrapeyard/artifact-store': resolve(__dirname, '../../packages/artifact-store/src/index.ts'),
      '@scrapeyard/sandbox': resolve(__dirname, '../../packages/sandbox/src/index.ts')
    }
  }
});
