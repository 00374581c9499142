import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@levelscope/contracts': packageSource('contracts'),
      '@levelscope/analysis-kit': packageSource('analysis-kit'),
      '@levelscope/logger': packageSource('logger'),
      '@levelscope/provider-yahoo': packageSource('provider-yahoo'),
    },
  },
});
