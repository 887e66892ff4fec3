import { stringify } from 'yaml';
import type { TargetMetadata } from '@frontport/types';

/** YAMLフロントマターの区切り */
export const YAML_DELIMITER = '---';

/**
 * メタデータをYAMLに変換
 * キーはマッピング時の挿入順、Unicodeはエスケープしない、折り返さない
 */
export function serializeMetadata(metadata: TargetMetadata): string {
  return stringify(metadata, {
    indentSeq: false,
    lineWidth: 0,
  });
}

/**
 * YAMLフロントマターと本文を結合して出力文書を作る
 */
export function reassembleDocument(metadata: TargetMetadata, body: string): string {
  return `${YAML_DELIMITER}\n${serializeMetadata(metadata)}${YAML_DELIMITER}\n\n${body}`;
}
