import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    hookTimeout: 30000,

    // process.exitCodeを書き換えるテストがあるため1プロセスで順に実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    reporters: ['default'],
    environment: 'node',
  },
});
