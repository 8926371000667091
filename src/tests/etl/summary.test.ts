/**
 * etl/summary.ts のユニットテスト
 */

import { describe, it, expect } from 'vitest';
import { formatRunSummary } from '@/lib/etl/summary';
import type { RunSummary, SeriesReport } from '@/lib/etl/orchestrator';

function report(overrides: Partial<SeriesReport>): SeriesReport {
  return {
    seriesId: 'GDP',
    state: 'DONE',
    transitions: ['PENDING', 'METADATA_SYNCED', 'FETCHING', 'TRANSFORMING', 'LOADING', 'DONE'],
    watermark: null,
    requestedStart: null,
    fetched: 0,
    transform: { accepted: 0, missing: 0, invalid: 0, duplicate: 0 },
    inserted: 0,
    updated: 0,
    durationMs: 0,
    ...overrides,
  };
}

describe('etl/summary.ts', () => {
  it('系列ごとの結果と合計を整形する', () => {
    const summary: RunSummary = {
      runId: 'run-1',
      startedAt: '2024-04-02T09:00:00.000Z',
      finishedAt: '2024-04-02T09:00:01.500Z',
      durationMs: 1500,
      series: [
        report({
          seriesId: 'GDP',
          watermark: '2023-10-01',
          requestedStart: '2023-10-01',
          fetched: 2,
          transform: { accepted: 1, missing: 1, invalid: 0, duplicate: 0 },
          updated: 1,
        }),
        report({
          seriesId: 'UNRATE',
          state: 'FAILED',
          failedAt: 'FETCHING',
          error: {
            code: 'SOURCE_UNAVAILABLE',
            message: 'FRED API responded HTTP 503: Service Unavailable',
          },
        }),
        report({ seriesId: 'FEDFUNDS', fetched: 3, inserted: 3 }),
      ],
      succeeded: ['GDP', 'FEDFUNDS'],
      failed: ['UNRATE'],
      totals: { inserted: 3, updated: 1, discarded: 1 },
      success: false,
    };

    expect(formatRunSummary(summary).split('\n')).toEqual([
      '========================================',
      'ETL RUN SUMMARY (run-1)',
      '========================================',
      '  [DONE]   GDP          from 2023-10-01: fetched 2, inserted 0, updated 1, discarded 1',
      '  [FAILED] UNRATE       at FETCHING: SOURCE_UNAVAILABLE FRED API responded HTTP 503: Service Unavailable',
      '  [DONE]   FEDFUNDS     from full history: fetched 3, inserted 3, updated 0, discarded 0',
      '----------------------------------------',
      'Series succeeded: 2',
      'Series failed:    1 (UNRATE)',
      'Rows inserted:    3',
      'Rows updated:     1',
      'Rows discarded:   1',
      'Duration:         1.5s',
      '========================================',
    ]);
  });

  it('失敗がなければ系列名を出さない', () => {
    const summary: RunSummary = {
      runId: 'run-2',
      startedAt: '2024-04-02T09:00:00.000Z',
      finishedAt: '2024-04-02T09:00:00.000Z',
      durationMs: 0,
      series: [],
      succeeded: [],
      failed: [],
      totals: { inserted: 0, updated: 0, discarded: 0 },
      success: true,
    };

    const lines = formatRunSummary(summary).split('\n');

    expect(lines).toContain('Series failed:    0');
    expect(lines).toContain('Duration:         0.0s');
  });
});
