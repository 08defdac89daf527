import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      $lib: path.resolve(__dirname, 'src/lib')
    }
  },

  test: {
    include: ['src/tests/**/*.{test,spec}.ts'],
    environment: 'node',

    // Keep tests fast and simple
    testTimeout: 5000,
    hookTimeout: 5000,

    // Binding tables are frozen per session; nothing is shared across files,
    // but logger env overrides in logger.test.ts are process-wide.
    sequence: {
      concurrent: false,
      shuffle: false
    }
  }
});
