import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSource = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@storypage/api-client': resolveSource('./packages/api-client/src/index.ts'),
      '@storypage/crypto': resolveSource('./packages/crypto/src/index.ts'),
      '@storypage/data-model': resolveSource('./packages/data-model/src/index.ts')
    }
  },
  test: {
    include: ['packages/**/src/**/*.{test,spec}.ts', 'services/**/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    watch: false,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'text-summary'],
      include: ['packages/*/src/**/*.ts', 'services/*/src/**/*.ts'],
      exclude: [
        '**/*.test.*',
        '**/*.spec.*',
        '**/*.d.ts',

        // --- Re-export Index Files ---
        'packages/*/src/index.ts'
      ],
      thresholds: {
        branches: 95,
        functions: 100,
        lines: 95,
        statements: 95
      }
    }
  }
});
