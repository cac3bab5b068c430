import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (directory: string): string => fileURLToPath(new URL(`./${directory}/`, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      include: ['src'],
      exclude: ['__tests__', '__mocks__', 'src/types', 'src/index.ts'],
    },
    setupFiles: ['__tests__/_setup'],
    include: ['__tests__/**/*.test.ts'],
    alias: {
      '@/tests/': fromRoot('__tests__'),
      '@/mocks/': fromRoot('__mocks__'),
      '@/': fromRoot('src'),
    },
  },
});
