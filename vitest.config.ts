import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    testTimeout: 10000,
    hookTimeout: 15000,

    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    setupFiles: ['./test-setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['coverage/**', 'dist/**', 'packages/**/dist/**', '**/*.d.ts', '**/*.config.*', '**/test-setup.ts'],
    },
  },

  // Workspace packages resolve straight to their sources
  resolve: {
    alias: {
      '@banterbot/shared': fromRoot('./packages/shared/src/index.ts'),
      '@banterbot/capabilities': fromRoot('./packages/capabilities/src/index.ts'),
    },
  },
});
