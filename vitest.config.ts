import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*_test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*.ts', 'helpers/**/*.ts'],
      exclude: ['node_modules/', 'dist/', 'tests/**', 'vitest.config.ts'],
    },
  },
});
