import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 60000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    fileParallelism: false,
    // Every test file gets its own in-memory SQLite database (see tests/setup.ts)
    env: {
      NODE_ENV: 'test',
      DB_CLIENT: 'better-sqlite3',
      DB_FILENAME: ':memory:',
      DB_MIGRATE_ON_START: 'true',
      DB_SEED_DEMO_DATA: 'false',
      LOG_LEVEL: 'silent',
      UNIT_OF_WORK_RETRY_DELAY_MS: '1',
    },
  },
});
