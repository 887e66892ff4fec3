/**
 * convert コマンド
 * 入力ディレクトリのZolaコンテンツをAstro形式に変換する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ConfigLoader,
  type ConversionSummary,
  type DocumentWriter,
  type Logger,
  type RunConfig,
} from '@frontport/types';
import {
  ConversionRunner,
  DocumentConverter,
  FileDiscovery,
  SchemaMapper,
  formatLocalDate,
} from '@frontport/converter';
import { createEnricher } from '@frontport/enricher';
import { FileOutputWriter } from '@frontport/storage';
import { formatSummary, getErrorMessage } from '../utils/output.js';

export interface ConvertCommandOptions {
  /** 著者名（デフォルト: 設定ファイル、なければ"Anonymous"） */
  author?: string;
  /** Anthropic APIキー（デフォルト: 環境変数ANTHROPIC_API_KEY） */
  anthropicKey?: string;
  /** 不足しているdescription・tagsを生成する */
  generateMissing?: boolean;
  /** 書き込みを行わない */
  dryRun?: boolean;
  /** 設定ファイルのパス */
  config?: string;
}

/**
 * テストから差し替えるための依存
 */
export interface ConvertDependencies {
  logger?: Logger;
  writer?: DocumentWriter;
  /** 実行日（ファイル名に日付がない場合の公開日） */
  now?: () => Date;
  /** 中断シグナル */
  signal?: AbortSignal;
  /** 設定ファイル探索の起点（デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 入力ディレクトリを検証
 */
async function assertDirectory(dir: string): Promise<void> {
  try {
    const stats = await fs.stat(dir);
    if (!stats.isDirectory()) {
      throw new Error(`Input path is not a directory: ${dir}`);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Input directory not found: ${dir}`);
    }
    throw error;
  }
}

/**
 * 変換を実行して集計を返す
 * 設定やディレクトリの問題は例外として投げる（文書ごとのエラーは集計に含まれる）
 */
export async function runConversion(
  inputDir: string,
  outputDir: string,
  options: ConvertCommandOptions,
  deps: ConvertDependencies = {}
): Promise<ConversionSummary> {
  const logger = deps.logger ?? console;
  const writer = deps.writer ?? new FileOutputWriter();
  const now = deps.now ?? (() => new Date());

  const inputRoot = path.resolve(inputDir);
  const outputRoot = path.resolve(outputDir);
  await assertDirectory(inputRoot);

  const { config } = await ConfigLoader.resolve({ configPath: options.config, cwd: deps.cwd });

  const apiKey = options.anthropicKey ?? process.env.ANTHROPIC_API_KEY;
  const generateMissing = options.generateMissing ?? false;
  if (generateMissing && !apiKey) {
    logger.warn(
      'Warning: --generate-missing requires an Anthropic API key (--anthropic-key or ANTHROPIC_API_KEY); ' +
      'missing descriptions and tags will not be generated'
    );
  }

  const enricher = createEnricher({
    enabled: generateMissing,
    apiKey,
    config: config.enrichment,
    logger,
  });

  const run: RunConfig = Object.freeze({
    author: options.author ?? config.author,
    today: formatLocalDate(now()),
    enrich: enricher.active,
    dryRun: options.dryRun ?? false,
    delayMs: config.enrichment.delayMs,
  });

  const runner = new ConversionRunner({
    run,
    converter: new DocumentConverter({
      run,
      mapper: new SchemaMapper({ enricher, logger }),
      writer,
      logger,
    }),
    discovery: new FileDiscovery({ rootDir: inputRoot, config: config.files }),
    writer,
    logger,
  });

  return await runner.execute(inputRoot, outputRoot, deps.signal);
}

/**
 * convert コマンドを実行
 */
export async function executeConvert(
  inputDir: string,
  outputDir: string,
  options: ConvertCommandOptions
): Promise<void> {
  // Ctrl+Cは処理中の文書を書き終えてから止める
  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn('\nInterrupted: stopping after the current file...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const summary = await runConversion(inputDir, outputDir, options, { signal: controller.signal });
    console.log(formatSummary(summary));
  } catch (error) {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exit(1);
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}
