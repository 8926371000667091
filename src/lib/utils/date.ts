/**
 * 観測日ユーティリティ
 *
 * @description FRED の観測日は暦日（YYYY-MM-DD）で、タイムゾーンを持たない。
 * すべて UTC 00:00 の Date として扱う
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * 日付が有効な形式（YYYY-MM-DD）かつ実在する暦日かチェック
 */
export function isValidDateFormat(dateStr: string): boolean {
  if (!DATE_PATTERN.test(dateStr)) {
    return false;
  }

  const [year, month, day] = dateStr.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Date を YYYY-MM-DD（UTC）に変換
 */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
