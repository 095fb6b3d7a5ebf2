import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  resolve: {
    alias: {
      '@main': path.resolve(__dirname, 'src/main'),
      '@shared': path.resolve(__dirname, 'src/shared')
    }
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      all: true,
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['src/main/services/**/*.ts'],
      exclude: ['src/main/services/display/**'],
      thresholds: {
        perFile: true,
        lines: 60,
        statements: 60,
        functions: 80,
        branches: 55
      }
    }
  }
});
