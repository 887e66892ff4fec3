/**
 * 出力フォーマットユーティリティ
 */

import type { ConversionSummary } from '@frontport/types';

/**
 * 実行結果のサマリ行
 */
export function formatSummary(summary: Pick<ConversionSummary, 'success' | 'total'>): string {
  return `\nConversion complete: ${summary.success}/${summary.total} files converted successfully`;
}

/**
 * エラーメッセージを取り出す
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return '不明なエラーが発生しました。';
}
