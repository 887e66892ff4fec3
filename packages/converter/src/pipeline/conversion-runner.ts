import * as path from 'path';
import type {
  ConversionResult,
  ConversionSummary,
  DocumentWriter,
  Logger,
  RunConfig,
} from '@frontport/types';
import type { FileDiscovery } from '../discovery/file-discovery.js';
import type { DocumentConverter } from './document-converter.js';

export interface ConversionRunnerOptions {
  run: RunConfig;
  converter: DocumentConverter;
  discovery: FileDiscovery;
  writer: DocumentWriter;
  logger?: Logger;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * 入力ディレクトリ全体の変換
 * 1文書ずつ順番に処理し、ディレクトリ構造を出力側に再現する
 */
export class ConversionRunner {
  private run: RunConfig;
  private converter: DocumentConverter;
  private discovery: FileDiscovery;
  private writer: DocumentWriter;
  private logger: Logger;

  constructor(options: ConversionRunnerOptions) {
    this.run = options.run;
    this.converter = options.converter;
    this.discovery = options.discovery;
    this.writer = options.writer;
    this.logger = options.logger ?? console;
  }

  /**
   * 変換を実行
   * @param inputDir 入力ルート（discoveryと同じディレクトリ）
   * @param outputDir 出力ルート
   * @param signal 中断シグナル（文書の間でのみ確認する）
   */
  async execute(inputDir: string, outputDir: string, signal?: AbortSignal): Promise<ConversionSummary> {
    const summary: ConversionSummary = { total: 0, success: 0, results: [] };

    if (!this.run.dryRun) {
      await this.writer.ensureDir(outputDir);
    }

    const files = await this.discovery.findFiles();

    for (const relativePath of files) {
      if (signal?.aborted) {
        this.logger.warn('Conversion aborted');
        break;
      }

      summary.total += 1;
      const fileName = path.basename(relativePath);

      if (this.run.dryRun) {
        this.logger.log(`Would convert: ${fileName}`);
        continue;
      }

      // 入力側の相対ディレクトリを出力側に再現
      const inputPath = path.join(inputDir, relativePath);
      const targetDir = path.join(outputDir, path.dirname(relativePath));

      const result: ConversionResult = await this.converter.convertFile(inputPath, targetDir);
      summary.results.push(result);

      if (result.ok) {
        summary.success += 1;
        this.logger.log(`Converted: ${fileName}`);
      } else {
        this.logger.log(`Failed to convert: ${fileName}`);
      }

      // 補完APIのレート制限対策
      if (this.run.enrich && this.run.delayMs > 0) {
        await sleep(this.run.delayMs);
      }
    }

    return summary;
  }
}
