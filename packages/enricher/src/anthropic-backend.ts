/**
 * Anthropic Messages APIのテキスト生成バックエンド
 */

import { z } from 'zod';
import type { TextGenerationBackend } from '@frontport/types';

/**
 * バックエンド設定
 */
export interface AnthropicBackendConfig {
  /** APIキー */
  apiKey: string;
  /** 生成モデル */
  model: string;
  /** APIのベースURL（デフォルト: https://api.anthropic.com） */
  apiUrl?: string;
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
}

/**
 * 生成APIのエラー
 */
export class GenerationApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly data?: unknown
  ) {
    super(message);
    this.name = 'GenerationApiError';
  }
}

export const API_VERSION = '2023-06-01';

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

const errorResponseSchema = z.object({
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

/**
 * Anthropicバックエンド
 *
 * 1プロンプトを1リクエストで送り、最初のテキストブロックを返す（リトライしない）
 */
export class AnthropicBackend implements TextGenerationBackend {
  private apiKey: string;
  private model: string;
  private apiUrl: string;
  private timeout: number;

  constructor(config: AnthropicBackendConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.apiUrl = (config.apiUrl || 'https://api.anthropic.com').replace(/\/+$/, '');
    this.timeout = config.timeoutMs || 30000;
  }

  /**
   * テキストを生成
   */
  async generate(prompt: string, maxTokens: number): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(`${this.apiUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-api-key': this.apiKey,
          'anthropic-version': API_VERSION,
        },
        body: JSON.stringify({
          model: this.model,
          max_tokens: maxTokens,
          messages: [{ role: 'user', content: prompt }],
        }),
        signal: controller.signal,
      });

      // エラー時はJSONでない本文もあり得る
      const body: unknown = await response.json().catch((): unknown => null);

      if (!response.ok) {
        const parsedError = errorResponseSchema.safeParse(body);
        const message = parsedError.success
          ? `${parsedError.data.error.type}: ${parsedError.data.error.message}`
          : `HTTP ${response.status}: ${response.statusText}`;
        throw new GenerationApiError(message, response.status, body);
      }

      const parsed = messagesResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new GenerationApiError('Invalid response: unexpected message format', response.status, body);
      }

      const textBlock = parsed.data.content.find((block) => block.type === 'text' && block.text !== undefined);
      if (textBlock?.text === undefined) {
        throw new GenerationApiError('Invalid response: missing text content', response.status, body);
      }

      return textBlock.text.trim();
    } catch (error) {
      if (error instanceof GenerationApiError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === 'AbortError') {
          throw new Error(`Request timeout after ${this.timeout}ms`);
        }
        throw error;
      }

      throw new Error('Unknown error occurred');
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
