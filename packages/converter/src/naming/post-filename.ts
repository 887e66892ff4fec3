/**
 * 投稿ファイル名の日付プレフィックス（YYYY-MM-DD-）の扱い
 */

const DATE_PREFIX_PATTERN = /^(\d{4}-\d{2}-\d{2})-/;

/**
 * ファイル名から公開日を取得
 * @param filename ファイル名（ディレクトリを含まない）
 * @returns YYYY-MM-DD、プレフィックスがなければundefined
 */
export function parseDateFromFilename(filename: string): string | undefined {
  const match = DATE_PREFIX_PATTERN.exec(filename);
  return match ? match[1] : undefined;
}

/**
 * 日付プレフィックスを除いたファイル名
 */
export function cleanFilename(filename: string): string {
  return filename.replace(DATE_PREFIX_PATTERN, '');
}

/**
 * ローカル日付をYYYY-MM-DDに整形
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
