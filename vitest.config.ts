import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Spanner RPCs are mocked in tests; the emulator endpoint makes the client use
    // insecure channel credentials instead of looking up Google credentials.
    env: { SPANNER_EMULATOR_HOST: 'localhost:9010' },
  },
});
