import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Read by src/config at import time.
    env: {
      JWT_SECRET: 'test-secret',
      UPLOAD_BASE_URL: '/files',
      MAX_UPLOAD_SIZE_BYTES: '1024',
    },
    // Each test file boots its own in-process PostgreSQL.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
