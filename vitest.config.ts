import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // koffi registers struct names process-wide; keep every file in one worker
    // so registration order stays deterministic.
    fileParallelism: false,
    pool: 'threads',
    maxWorkers: 1,
    minWorkers: 1,
  },
});
