/**
 * ランサマリーのテキスト整形（CLI 出力用）
 */

import type { RunSummary, SeriesReport } from './orchestrator';

function formatSeriesLine(report: SeriesReport): string {
  const id = report.seriesId.padEnd(12);

  if (report.state === 'FAILED') {
    const code = report.error?.code ?? 'UNEXPECTED';
    const message = report.error?.message ?? '';
    return `  [FAILED] ${id} at ${report.failedAt ?? 'PENDING'}: ${code} ${message}`.trimEnd();
  }

  const start = report.requestedStart ?? 'full history';
  const discarded = report.transform.missing + report.transform.invalid + report.transform.duplicate;
  return (
    `  [DONE]   ${id} from ${start}: ` +
    `fetched ${report.fetched}, inserted ${report.inserted}, updated ${report.updated}, discarded ${discarded}`
  );
}

/**
 * サマリーを複数行テキストに整形
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    '========================================',
    `ETL RUN SUMMARY (${summary.runId})`,
    '========================================',
    ...summary.series.map(formatSeriesLine),
    '----------------------------------------',
    `Series succeeded: ${summary.succeeded.length}`,
    `Series failed:    ${summary.failed.length}${summary.failed.length > 0 ? ` (${summary.failed.join(', ')})` : ''}`,
    `Rows inserted:    ${summary.totals.inserted}`,
    `Rows updated:     ${summary.totals.updated}`,
    `Rows discarded:   ${summary.totals.discarded}`,
    `Duration:         ${(summary.durationMs / 1000).toFixed(1)}s`,
    '========================================',
  ];
  return lines.join('\n');
}
