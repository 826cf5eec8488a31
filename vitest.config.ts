import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['autoloop/**/*.test.ts'],
  },
});
