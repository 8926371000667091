/**
 * メールテンプレート
 *
 * @description ETL 実行失敗通知の HTML メール
 */

import type { RunSummary, SeriesReport } from '../etl/orchestrator';
import { formatCalendarDate } from '../utils/date';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

/**
 * HTMLエスケープ
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const CELL_STYLE = 'padding: 8px 12px; border-bottom: 1px solid #e5e7eb;';

function renderFailedRow(report: SeriesReport): string {
  return `
    <tr>
      <td style="${CELL_STYLE} font-family: monospace;">${escapeHtml(report.seriesId)}</td>
      <td style="${CELL_STYLE}">${escapeHtml(report.failedAt ?? 'PENDING')}</td>
      <td style="${CELL_STYLE}">${escapeHtml(report.error?.code ?? 'UNEXPECTED')}</td>
      <td style="${CELL_STYLE}">${escapeHtml(report.error?.message ?? '')}</td>
    </tr>`;
}

/**
 * 失敗通知メールテンプレート
 */
export function getRunFailureEmailTemplate(
  summary: RunSummary
): { subject: string; html: string } {
  const runDate = formatCalendarDate(new Date(summary.startedAt));
  const subject = `[ALERT] economic series ETL: ${summary.failed.length} series failed - ${runDate}`;
  const failedRows = summary.series.filter((report) => report.state === 'FAILED').map(renderFailedRow);

  const html = `
<!DOCTYPE html>
<html lang="ja">
<head>
  <meta charset="UTF-8">
  <title>ETL 失敗通知</title>
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 720px; margin: 0 auto; padding: 20px;">
  <div style="background-color: #fef2f2; border: 1px solid #fecaca; border-radius: 8px; padding: 20px; margin-bottom: 20px;">
    <h1 style="color: #dc2626; margin: 0 0 10px 0; font-size: 22px;">ETL 失敗通知</h1>
    <p style="color: #991b1b; margin: 0;">
      ${summary.failed.length} / ${summary.series.length} 系列の取り込みに失敗しました
    </p>
  </div>

  <p style="font-family: monospace; font-size: 13px;">Run ID: ${escapeHtml(summary.runId)}</p>

  <table style="width: 100%; border-collapse: collapse; margin-bottom: 20px;">
    <tr>
      <th style="${CELL_STYLE} text-align: left;">Series</th>
      <th style="${CELL_STYLE} text-align: left;">状態</th>
      <th style="${CELL_STYLE} text-align: left;">コード</th>
      <th style="${CELL_STYLE} text-align: left;">エラー</th>
    </tr>${failedRows.join('')}
  </table>

  <p style="color: #6b7280; font-size: 13px;">
    成功 ${summary.succeeded.length} 系列 / 追加 ${summary.totals.inserted} 行 / 更新 ${summary.totals.updated} 行。
    成功した系列のデータはコミット済みです。次回実行で失敗系列を再取得します。
  </p>
</body>
</html>
`.trim();

  return { subject, html };
}
