import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    // Units run in worker_threads and park with Atomics.wait; a separate
    // process per test file keeps a parked thread from outliving its file.
    pool: 'forks',
    testTimeout: 20_000,
  },
});
