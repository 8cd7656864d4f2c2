/// <reference types="vitest/config" />
import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string): string =>
  fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core-engine': fromRoot('./src/core-engine'),
      '@tile-system': fromRoot('./src/tile-system'),
      '@rule-engine': fromRoot('./src/rule-engine'),
    },
  },
  build: {
    outDir: 'dist',
    sourcemap: true,
  },
  test: {
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          globals: true,
          environment: 'node',
          include: ['tests/**/*.test.ts'],
        },
      },
    ],
  },
});
