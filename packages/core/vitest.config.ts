import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    // ファイル監視のテストはイベント待ちがあるため長めに取る
    testTimeout: 10000,
  },
});
