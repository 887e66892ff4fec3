/**
 * 不足しているdescription・tagsの補完
 */

import type { EnrichmentConfig, Logger, MetadataEnricher, TextGenerationBackend } from '@frontport/types';
import { AnthropicBackend } from './anthropic-backend.js';

export interface ModelEnricherOptions {
  /** プロンプトに含める本文の最大文字数（デフォルト: 1500） */
  maxContentLength?: number;
  /** description生成の最大トークン数（デフォルト: 200） */
  descriptionMaxTokens?: number;
  /** tags生成の最大トークン数（デフォルト: 100） */
  tagsMaxTokens?: number;
}

const IMAGE_PATTERN = /!\[.*?\]\(.*?\)/g;
const LINK_PATTERN = /\[.*?\]\(.*?\)/g;

/**
 * 本文から画像・リンク記法を除去し、先頭maxLength文字に切り詰める
 */
export function prepareContent(body: string, maxLength: number): string {
  const cleaned = body.replace(IMAGE_PATTERN, '').replace(LINK_PATTERN, '');
  // サロゲートペアを分割しないようにコードポイント単位で数える
  return Array.from(cleaned).slice(0, maxLength).join('');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 生成バックエンドを使う補完
 * バックエンドの失敗はログに出して空の結果にする
 */
export class ModelEnricher implements MetadataEnricher {
  readonly active = true;
  private backend: TextGenerationBackend;
  private logger: Logger;
  private maxContentLength: number;
  private descriptionMaxTokens: number;
  private tagsMaxTokens: number;

  constructor(backend: TextGenerationBackend, options: ModelEnricherOptions = {}, logger: Logger = console) {
    this.backend = backend;
    this.logger = logger;
    this.maxContentLength = options.maxContentLength ?? 1500;
    this.descriptionMaxTokens = options.descriptionMaxTokens ?? 200;
    this.tagsMaxTokens = options.tagsMaxTokens ?? 100;
  }

  async suggestDescription(body: string, title: string): Promise<string> {
    const content = prepareContent(body, this.maxContentLength);
    const prompt = [
      `Write a concise 1-2 sentence description for a blog post titled "${title}".`,
      'Here is the content:',
      `${content}...`,
      '',
      'Reply with the description only. Keep it engaging but factual, and under 160 characters.',
    ].join('\n');

    try {
      const text = await this.backend.generate(prompt, this.descriptionMaxTokens);
      return text.trim();
    } catch (error) {
      this.logger.error(`Error generating description: ${errorMessage(error)}`);
      return '';
    }
  }

  async suggestTags(body: string, title: string): Promise<string[]> {
    const content = prepareContent(body, this.maxContentLength);
    const prompt = [
      'Suggest 3-6 relevant tags for this blog post.',
      `Title: "${title}"`,
      `Content: ${content}...`,
      '',
      'Reply with the tags only, as a comma-separated list of lowercase words.',
      'Include the specific technologies or concepts the post mentions.',
    ].join('\n');

    try {
      const text = await this.backend.generate(prompt, this.tagsMaxTokens);
      return text
        .split(',')
        .map((tag) => tag.trim().toLowerCase())
        .filter((tag) => tag.length > 0);
    } catch (error) {
      this.logger.error(`Error generating tags: ${errorMessage(error)}`);
      return [];
    }
  }
}

/**
 * 補完しない場合の実装
 */
export class NoopEnricher implements MetadataEnricher {
  readonly active = false;

  async suggestDescription(_body: string, _title: string): Promise<string> {
    return '';
  }

  async suggestTags(_body: string, _title: string): Promise<string[]> {
    return [];
  }
}

export interface CreateEnricherOptions {
  /** 補完を行うか */
  enabled: boolean;
  /** APIキー（なければ補完しない） */
  apiKey?: string;
  config: EnrichmentConfig;
  logger?: Logger;
}

/**
 * 設定に応じた補完を生成
 */
export function createEnricher(options: CreateEnricherOptions): MetadataEnricher {
  const { enabled, apiKey, config, logger = console } = options;

  if (!enabled || !apiKey) {
    return new NoopEnricher();
  }

  const backend = new AnthropicBackend({
    apiKey,
    model: config.model,
    apiUrl: config.apiUrl,
    timeoutMs: config.timeoutMs,
  });

  return new ModelEnricher(
    backend,
    {
      maxContentLength: config.maxContentLength,
      descriptionMaxTokens: config.descriptionMaxTokens,
      tagsMaxTokens: config.tagsMaxTokens,
    },
    logger
  );
}
