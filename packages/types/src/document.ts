/**
 * 文書データの型定義
 */

/** 入力文書（読み込み後は変更しない） */
export interface RawDocument {
  /** 入力ファイルのパス */
  readonly path: string;
  /** 全文 */
  readonly text: string;
}

/** 区切り線で切り出したフロントマターと本文 */
export interface ExtractedFrontMatter {
  /** 区切り線の間のテキスト（前後の空白を除去済み） */
  block: string;
  /** 閉じ区切り線より後ろの本文（前後の空白を除去済み） */
  body: string;
}

/**
 * 変換先フロントマター
 * キーの挿入順がそのまま出力順になる
 */
export interface TargetMetadata {
  title: string;
  /** YYYY-MM-DD */
  pubDate: string;
  author: string;
  description?: string;
  tags?: string[];
}

/** 1文書の変換結果 */
export type ConversionResult =
  | { ok: true; inputPath: string; outputPath: string }
  | { ok: false; inputPath: string; reason: string };

/** 実行全体の集計 */
export interface ConversionSummary {
  total: number;
  success: number;
  results: ConversionResult[];
}

/** ログ出力先 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
