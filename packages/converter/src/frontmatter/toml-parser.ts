import { parse } from 'smol-toml';
import {
  isMetadataMap,
  toMetadataValue,
  type Logger,
  type SourceMetadata,
} from '@frontport/types';

export type FrontMatterParseResult =
  | { ok: true; metadata: SourceMetadata; recovered: boolean }
  | { ok: false; error: string };

export interface ParseFrontMatterOptions {
  logger?: Logger;
  /** 厳密パーサ（デフォルト: smol-toml） */
  parseToml?: (text: string) => unknown;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * TOMLを厳密にパースしてSourceMetadataに変換
 */
function parseStrict(block: string, parseToml: (text: string) => unknown): SourceMetadata {
  const value = toMetadataValue(parseToml(block));
  if (!isMetadataMap(value)) {
    throw new Error('Front matter must be a table');
  }
  return value;
}

/**
 * 既知の崩れ方の補正: 空行で途切れたテーブル・配列の続きを繋ぐ
 * 改行をLFに揃えてから左から1回だけ置換する（3連続の改行は2連続になる）
 */
export function collapseBlankLines(block: string): string {
  return block.replaceAll('\r\n', '\n').replaceAll('\n\n', '\n').trim();
}

/**
 * フロントマターをパース
 *
 * 1. 厳密にパース
 * 2. 失敗したら空行を詰めて1回だけ再試行
 * 3. それも失敗したら元のエラーと生テキストを出力して「メタデータなし」
 */
export function parseFrontMatter(
  block: string,
  options: ParseFrontMatterOptions = {}
): FrontMatterParseResult {
  const { logger = console, parseToml = parse } = options;
  let metadata: SourceMetadata;
  let recovered = false;

  try {
    metadata = parseStrict(block, parseToml);
  } catch (error) {
    try {
      metadata = parseStrict(collapseBlankLines(block), parseToml);
      recovered = true;
    } catch {
      const message = errorMessage(error);
      logger.error(`Error parsing TOML even after cleanup: ${message}`);
      logger.error('Raw frontmatter content:');
      logger.error(block);
      return { ok: false, error: message };
    }
  }

  if (Object.keys(metadata).length === 0) {
    return { ok: false, error: 'Front matter is empty' };
  }

  return { ok: true, metadata, recovered };
}
