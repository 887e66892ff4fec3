import type { FrontportConfig } from '../config.js';

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<FrontportConfig> {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new Error('Config must be an object');
  }

  const cfg = config as Record<string, unknown>;

  // バージョンのチェック
  if (cfg.version !== undefined && typeof cfg.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  if (cfg.author !== undefined && typeof cfg.author !== 'string') {
    throw new Error('config.author must be a string');
  }

  // files設定のバリデーション
  if (cfg.files !== undefined) {
    validateFilesConfig(cfg.files);
  }

  // enrichment設定のバリデーション
  if (cfg.enrichment !== undefined) {
    validateEnrichmentConfig(cfg.enrichment);
  }

  return cfg as Partial<FrontportConfig>;
}

function validateStringArray(value: unknown, name: string): void {
  if (!Array.isArray(value)) {
    throw new Error(`${name} must be an array`);
  }
  if (!value.every((item) => typeof item === 'string')) {
    throw new Error(`${name} must be an array of strings`);
  }
}

function validateFilesConfig(files: unknown): void {
  if (typeof files !== 'object' || files === null) {
    throw new Error('config.files must be an object');
  }

  const f = files as Record<string, unknown>;

  if (f.include !== undefined) {
    validateStringArray(f.include, 'config.files.include');
  }

  if (f.exclude !== undefined) {
    validateStringArray(f.exclude, 'config.files.exclude');
  }
}

function validateEnrichmentConfig(enrichment: unknown): void {
  if (typeof enrichment !== 'object' || enrichment === null) {
    throw new Error('config.enrichment must be an object');
  }

  const enr = enrichment as Record<string, unknown>;

  if (enr.model !== undefined && typeof enr.model !== 'string') {
    throw new Error('config.enrichment.model must be a string');
  }

  if (enr.apiUrl !== undefined && typeof enr.apiUrl !== 'string') {
    throw new Error('config.enrichment.apiUrl must be a string');
  }

  for (const key of ['timeoutMs', 'maxContentLength', 'descriptionMaxTokens', 'tagsMaxTokens'] as const) {
    const value = enr[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new Error(`config.enrichment.${key} must be a number`);
    }
    if (value <= 0) {
      throw new Error(`config.enrichment.${key} must be positive`);
    }
  }

  const delayMs = enr.delayMs;
  if (delayMs !== undefined && typeof delayMs !== 'number') {
    throw new Error('config.enrichment.delayMs must be a number');
  }

  if (typeof delayMs === 'number' && delayMs < 0) {
    throw new Error('config.enrichment.delayMs must be non-negative');
  }
}
