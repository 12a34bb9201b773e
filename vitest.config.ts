import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@notekeep/shared': path.resolve(__dirname, 'packages/shared/src'),
      '@notekeep/durable-file': path.resolve(__dirname, 'packages/durable-file/src'),
      '@notekeep/notes-store': path.resolve(__dirname, 'packages/notes-store/src'),
    },
  },
  test: {
    environment: 'node',
    include: [
      'packages/shared/src/**/*.test.ts',
      'packages/durable-file/src/**/*.test.ts',
      'packages/notes-store/src/**/*.test.ts',
      'packages/notes-cli/src/**/*.test.ts',
    ],
  },
});
