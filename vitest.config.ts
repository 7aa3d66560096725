import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // process.chdir недоступен в worker threads.
    pool: 'forks',
  },
});
