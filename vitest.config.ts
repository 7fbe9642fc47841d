import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': resolve(__dirname, 'src/lib'),
      '@flows': resolve(__dirname, 'flows')
    }
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['test/**/*.test.ts'],
    reporters: 'default'
  }
});
