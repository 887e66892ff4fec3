import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 実ファイルを書き込むテストがあるため長めに設定
    testTimeout: 30000,
    hookTimeout: 30000,

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // テスト環境
    environment: 'node',
  },
});
