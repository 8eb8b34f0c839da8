/// <reference types="vite/client" />
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

// https://vite.dev/config/
export default defineConfig({
  plugins: [
    tsconfigPaths(),
  ],
  test: {
    include: ['jslib/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['jslib/**/*.ts'],
      exclude: ['jslib/**/*.test.ts', 'jslib/**/*.arbitrary.ts'],
    },
    // mirrors tsconfig paths; limited to our own roots so dependencies' #imports are untouched
    alias: [
      {
        find: /^#((?:index|limit|matcher|split|tokenizer|types|util)(?:\/.*)?)$/,
        replacement: fileURLToPath(new URL('./jslib/', import.meta.url)) + '$1',
      },
    ],
  },
});
