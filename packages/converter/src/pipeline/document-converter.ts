import { readFile } from 'fs/promises';
import * as path from 'path';
import type {
  ConversionResult,
  DocumentWriter,
  Logger,
  RawDocument,
  RunConfig,
} from '@frontport/types';
import { extractFrontMatter } from '../frontmatter/extractor.js';
import { parseFrontMatter } from '../frontmatter/toml-parser.js';
import type { SchemaMapper } from '../mapper/schema-mapper.js';
import { reassembleDocument } from '../reassembler/yaml-reassembler.js';
import { cleanFilename, parseDateFromFilename } from '../naming/post-filename.js';

export interface DocumentConverterOptions {
  run: RunConfig;
  mapper: SchemaMapper;
  writer: DocumentWriter;
  logger?: Logger;
}

/**
 * 1文書の変換
 * 抽出 → パース → マッピング → 再構成 → 書き込み
 * エラーはすべてこの単位で捕捉し、失敗結果として返す
 */
export class DocumentConverter {
  private run: RunConfig;
  private mapper: SchemaMapper;
  private writer: DocumentWriter;
  private logger: Logger;

  constructor(options: DocumentConverterOptions) {
    this.run = options.run;
    this.mapper = options.mapper;
    this.writer = options.writer;
    this.logger = options.logger ?? console;
  }

  /**
   * ファイルを変換して出力ディレクトリに書き込む
   * @param inputPath 入力ファイルのパス
   * @param outputDir 出力先ディレクトリ
   */
  async convertFile(inputPath: string, outputDir: string): Promise<ConversionResult> {
    try {
      const document: RawDocument = {
        path: inputPath,
        text: await readFile(inputPath, 'utf-8'),
      };

      const content = await this.convertDocument(document);
      if (content === null) {
        return { ok: false, inputPath, reason: 'Could not parse frontmatter' };
      }

      const outputPath = path.join(outputDir, cleanFilename(path.basename(inputPath)));
      await this.writer.write(outputPath, content);

      return { ok: true, inputPath, outputPath };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error converting file ${inputPath}: ${message}`);
      return { ok: false, inputPath, reason: message };
    }
  }

  /**
   * 文書を変換後のテキストにする
   * @returns フロントマターが見つからない・パースできない場合はnull
   */
  async convertDocument(document: RawDocument): Promise<string | null> {
    const pubDate = this.resolvePubDate(document.path);

    const extracted = extractFrontMatter(document.text);
    if (!extracted) {
      this.logger.warn(`Warning: Could not parse frontmatter in ${document.path}`);
      return null;
    }

    const parsed = parseFrontMatter(extracted.block, { logger: this.logger });
    if (!parsed.ok) {
      this.logger.warn(`Warning: Could not parse frontmatter in ${document.path}`);
      return null;
    }

    const metadata = await this.mapper.map(parsed.metadata, {
      pubDate,
      author: this.run.author,
      body: extracted.body,
    });

    return reassembleDocument(metadata, extracted.body);
  }

  /**
   * ファイル名の日付、なければ実行日
   */
  private resolvePubDate(inputPath: string): string {
    const date = parseDateFromFilename(path.basename(inputPath));
    if (date) {
      return date;
    }
    this.logger.warn(`Warning: Could not parse date from filename ${inputPath}`);
    return this.run.today;
  }
}
