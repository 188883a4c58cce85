import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Include test patterns
    include: ['src/**/*.{test,spec}.ts'],

    exclude: ['node_modules/**', 'dist/**'],

    // Reporter
    reporters: ['default'],
  },
});
