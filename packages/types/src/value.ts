/**
 * フロントマターの値の型定義とアクセサ
 */

export type MetadataValue = string | number | boolean | MetadataValue[] | MetadataMap;

export interface MetadataMap {
  [key: string]: MetadataValue;
}

/** 変換元フロントマター（TOML由来） */
export type SourceMetadata = MetadataMap;

/**
 * 値の形が想定と異なる場合のエラー
 */
export class UnexpectedShapeError extends Error {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Unexpected shape at "${path}": expected ${expected}, got ${actual}`);
    this.name = 'UnexpectedShapeError';
  }
}

/**
 * 値の種類を表す文字列（エラーメッセージ用）
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (value instanceof Date) return 'date';
  if (typeof value === 'object') return 'map';
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isMetadataMap(value: MetadataValue): value is MetadataMap {
  return typeof value === 'object' && !Array.isArray(value);
}

/**
 * パーサの出力をMetadataValueに変換
 * 日付はTOMLの表記のまま文字列にする
 */
export function toMetadataValue(value: unknown, path: string = '$'): MetadataValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toMetadataValue(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    const map: MetadataMap = {};
    for (const [key, item] of Object.entries(value)) {
      map[key] = toMetadataValue(item, path === '$' ? key : `${path}.${key}`);
    }
    return map;
  }
  throw new UnexpectedShapeError(path, 'string, number, boolean, list or map', describeValue(value));
}

export function hasKey(map: MetadataMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * 文字列値を取得（キーがなければundefined）
 */
export function getString(map: MetadataMap, key: string, path: string = key): string | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map[key];
  if (typeof value !== 'string') {
    throw new UnexpectedShapeError(path, 'string', describeValue(value));
  }
  return value;
}

/**
 * テーブル値を取得（キーがなければundefined）
 */
export function getMap(map: MetadataMap, key: string, path: string = key): MetadataMap | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map[key];
  if (!isMetadataMap(value)) {
    throw new UnexpectedShapeError(path, 'map', describeValue(value));
  }
  return value;
}

/**
 * 文字列配列を取得（キーがなければundefined）
 */
export function getStringList(map: MetadataMap, key: string, path: string = key): string[] | undefined {
  if (!hasKey(map, key)) return undefined;
  const value = map[key];
  if (!Array.isArray(value)) {
    throw new UnexpectedShapeError(path, 'list', describeValue(value));
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw new UnexpectedShapeError(`${path}[${index}]`, 'string', describeValue(item));
    }
    return item;
  });
}
