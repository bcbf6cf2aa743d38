import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/@tally/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
