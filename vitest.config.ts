/**
 * Vitest configuration
 *
 * - Node environment (no DOM; the server has no UI)
 * - Unit and integration tests live under server/tests
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['server/tests/**/*.test.ts'],

    exclude: ['node_modules', 'dist'],

    // Suites that open loopback sockets need a little headroom
    testTimeout: 10000,

    pool: 'threads',
  },
});
