import fg from 'fast-glob';
import * as path from 'path';
import type { FilesConfig } from '@frontport/types';

export interface FileDiscoveryOptions {
  /** 入力ルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * ファイル検索クラス
 * Globパターンで変換対象のMarkdownファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（入力ルートからの相対パス、昇順）
   */
  async findFiles(): Promise<string[]> {
    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.config.exclude,
      absolute: false, // 相対パスを返す
      onlyFiles: true,
      dot: true, // ドットファイル・ディレクトリも対象（除外はexcludeで指定）
    });

    // 走査順はファイルシステム依存なので並べ替える
    return files.sort();
  }
}
