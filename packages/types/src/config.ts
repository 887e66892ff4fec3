/**
 * 設定ファイルの型定義
 */

export interface FrontportConfig {
  version: string;
  /** デフォルトの著者名 */
  author: string;
  files: FilesConfig;
  enrichment: EnrichmentConfig;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
}

export interface EnrichmentConfig {
  /** 生成モデル */
  model: string;
  /** APIのベースURL */
  apiUrl: string;
  /** リクエストタイムアウト（ミリ秒） */
  timeoutMs: number;
  /** 文書ごとの待機時間（ミリ秒）。APIのレート制限対策 */
  delayMs: number;
  /** プロンプトに含める本文の最大文字数 */
  maxContentLength: number;
  /** description生成の最大トークン数 */
  descriptionMaxTokens: number;
  /** tags生成の最大トークン数 */
  tagsMaxTokens: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: FrontportConfig = {
  version: '1.0',
  author: 'Anonymous',
  files: {
    include: ['**/*.md'],
    exclude: [],
  },
  enrichment: {
    model: 'claude-3-haiku-20240307',
    apiUrl: 'https://api.anthropic.com',
    timeoutMs: 30000,
    delayMs: 1000,
    maxContentLength: 1500,
    descriptionMaxTokens: 200,
    tagsMaxTokens: 100,
  },
};
