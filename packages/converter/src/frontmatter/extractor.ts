import type { ExtractedFrontMatter } from '@frontport/types';

/**
 * 最初の区切りと、その次に現れる区切りの間を切り出す（最短一致）
 * 本文中の区切り風の文字列は分割に影響しない
 */
const FRONT_MATTER_PATTERN = /\+\+\+([\s\S]*?)\+\+\+/;

/**
 * 文書からフロントマターと本文を切り出す
 * @param text 文書全文
 * @returns 区切りが2つ揃わない場合はnull
 */
export function extractFrontMatter(text: string): ExtractedFrontMatter | null {
  const match = FRONT_MATTER_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const block = match[1].trim();
  const body = text.slice(match.index + match[0].length).trim();

  return { block, body };
}
