import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_SILENT: 'true',
      LOG_FILE: '',
      BCRYPT_ROUNDS: '4',
      DATABASE_HOST: 'localhost',
      DATABASE_NAME: 'library_test',
      DATABASE_USER: 'postgres',
      DATABASE_PASSWORD: 'test-secret',
    },
  },
});
