import { defineConfig } from 'vitest/config';

/**
 * Vitest runs against the TypeScript sources of every workspace package.
 */
export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    environment: 'node',
  },
});
