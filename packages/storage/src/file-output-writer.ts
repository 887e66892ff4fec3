/**
 * ファイルベースのDocumentWriter実装
 */

import { promises as fs } from 'node:fs';
import { dirname, basename, join, normalize } from 'node:path';
import { createHash } from 'node:crypto';
import type { DocumentWriter } from '@frontport/types';

/**
 * 変換結果をファイルに書き込む
 * 一時ファイルに書いてからリネームするので、途中で中断されても
 * 書きかけのファイルが出力先に残らない
 */
export class FileOutputWriter implements DocumentWriter {
  private sequence = 0;

  /**
   * ディレクトリを作成
   */
  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(normalize(dir), { recursive: true });
  }

  /**
   * ファイルを書き込む
   */
  async write(path: string, content: string): Promise<void> {
    const filePath = normalize(path);

    // ディレクトリを作成
    await this.ensureDir(dirname(filePath));

    const tempPath = this.getTempPath(filePath);
    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }

  /**
   * 同じディレクトリ内の一時ファイルパス（renameを同一ファイルシステム内で行うため）
   */
  private getTempPath(filePath: string): string {
    const suffix = createHash('sha256')
      .update(`${process.pid}:${Date.now()}:${++this.sequence}:${filePath}`)
      .digest('hex')
      .slice(0, 12);
    return join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`);
  }
}
