import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false, // Prefer explicit imports for better portability
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      exclude: ['node_modules/', 'dist/', 'src/scripts/'],
    },
    env: {
      NODE_ENV: 'test',
      TZ: 'UTC',
      LOG_LEVEL: 'silent',
      COOKIE_SECRET: 'test-secret-test-secret',
      GOOGLE_CLIENT_ID: 'test-client-id',
      GOOGLE_CLIENT_SECRET: 'test-client-secret',
      GOOGLE_REDIRECT_URI: 'http://localhost:3000/auth/callback',
      AI_API_KEY: 'test-api-key',
    },
  },
});
