import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      exclude: [
        'dist/**',
        'coverage/**',
        'src/main.ts',
        'vitest.config.ts',
      ],
    },
  },
});
