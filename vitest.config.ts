import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Season Monte Carlo and Kalman tests run full seeded simulations
    testTimeout: 30_000,
  },
});
