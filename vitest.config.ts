import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@functions': path.resolve(__dirname, 'src/functions'),
      '@libs': path.resolve(__dirname, 'src/libs'),
      '@resources': path.resolve(__dirname, 'src/resources'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
