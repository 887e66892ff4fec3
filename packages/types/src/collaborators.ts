/**
 * 変換パイプラインが依存する外部機能のインターフェイス
 */

/**
 * テキスト生成バックエンド
 * プロンプトを受け取り生成テキストを返す。失敗時はrejectする
 */
export interface TextGenerationBackend {
  generate(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * メタデータ補完
 * 失敗は「データなし」と区別しない（rejectしない）
 */
export interface MetadataEnricher {
  /** 生成バックエンドに接続しているか */
  readonly active: boolean;
  suggestDescription(body: string, title: string): Promise<string>;
  suggestTags(body: string, title: string): Promise<string[]>;
}

/**
 * 変換結果の書き込み先
 */
export interface DocumentWriter {
  /** ディレクトリを作成（既存なら何もしない） */
  ensureDir(dir: string): Promise<void>;
  /** ファイルを書き込む（親ディレクトリは必要に応じて作成） */
  write(path: string, content: string): Promise<void>;
}

/**
 * 実行設定（1回の実行の間は変更しない）
 */
export interface RunConfig {
  /** 全文書に使う著者名 */
  readonly author: string;
  /** ファイル名に日付がない場合の公開日（YYYY-MM-DD） */
  readonly today: string;
  /** メタデータ補完を行うか */
  readonly enrich: boolean;
  /** 書き込みを行わず対象ファイルの表示のみ */
  readonly dryRun: boolean;
  /** 補完有効時の文書間の待機時間（ミリ秒） */
  readonly delayMs: number;
}
