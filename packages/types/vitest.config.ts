import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
    ],
    environment: 'node',
  },
});
