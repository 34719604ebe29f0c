import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // The accuracy tests hash a few hundred thousand strings
    testTimeout: 30000,
  },
});
