import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: [
      'node_modules',
      '.healbox',
      'dist',
    ],
    include: ['test/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
