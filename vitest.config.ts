import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['habitica-cli/src/**/*.test.ts'],
  },
});
