import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    clearMocks: true,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      DB_USER: 'test-user',
      DB_PASSWORD: 'test-secret',
      DB_HOST: 'localhost',
      DB_PORT: '5432',
      DB_NAME: 'territory_test',
    },
  },
});
