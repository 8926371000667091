/**
 * etl/job-run.ts のユニットテスト
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createMockSupabase } from '../helpers/supabase-mock';
import { createRunSummary } from '../helpers/run-summary';

const { mockCreateAdminClient } = vi.hoisted(() => ({
  mockCreateAdminClient: vi.fn(),
}));

vi.mock('@/lib/supabase/admin', () => ({
  createAdminClient: mockCreateAdminClient,
}));

import { ETL_RUNS_TABLE, completeEtlRun, failEtlRun, startEtlRun } from '@/lib/etl/job-run';

describe('etl/job-run.ts', () => {
  let mockSupabase: ReturnType<typeof createMockSupabase>;

  function useSupabase(error: { message: string } | null = null) {
    mockSupabase = createMockSupabase({ [ETL_RUNS_TABLE]: { data: null, error } });
    mockCreateAdminClient.mockReturnValue(mockSupabase);
  }

  beforeEach(() => {
    useSupabase();
  });

  describe('startEtlRun', () => {
    it('running 状態の行を INSERT する', async () => {
      const ok = await startEtlRun('run-1', { series: ['GDP'] });

      expect(ok).toBe(true);
      expect(mockSupabase.chains[ETL_RUNS_TABLE].insert).toHaveBeenCalledWith({
        run_id: 'run-1',
        status: 'running',
        started_at: expect.any(String),
        finished_at: null,
        error_message: null,
        meta: { series: ['GDP'] },
      });
    });

    it('DB エラーでは false を返し例外は投げない', async () => {
      useSupabase({ message: 'relation "etl_runs" does not exist' });

      await expect(startEtlRun('run-1')).resolves.toBe(false);
    });
  });

  describe('completeEtlRun', () => {
    it('失敗系列があれば failed とエラー内容を記録する', async () => {
      const ok = await completeEtlRun(createRunSummary());

      expect(ok).toBe(true);
      const chain = mockSupabase.chains[ETL_RUNS_TABLE];
      expect(chain.update).toHaveBeenCalledWith({
        status: 'failed',
        finished_at: '2024-04-02T09:00:05.000Z',
        error_message: 'UNRATE: SOURCE_UNAVAILABLE FRED API unreachable: fetch failed',
        meta: {
          succeeded: ['GDP'],
          failed: ['UNRATE'],
          inserted: 0,
          updated: 1,
          discarded: 0,
          durationMs: 5000,
        },
      });
      expect(chain.eq).toHaveBeenCalledWith('run_id', 'run-1');
    });

    it('全系列成功なら success', async () => {
      const summary = createRunSummary({ failed: [], success: true });
      summary.series = summary.series.filter((report) => report.state === 'DONE');

      await completeEtlRun(summary);

      expect(mockSupabase.chains[ETL_RUNS_TABLE].update).toHaveBeenCalledWith(
        expect.objectContaining({ status: 'success', error_message: null })
      );
    });

    it('DB エラーでは false を返す', async () => {
      useSupabase({ message: 'timeout' });

      await expect(completeEtlRun(createRunSummary())).resolves.toBe(false);
    });
  });

  describe('failEtlRun', () => {
    it('failed とエラーメッセージを記録する', async () => {
      await failEtlRun('run-1', 'Missing env.SUPABASE_URL');

      expect(mockSupabase.chains[ETL_RUNS_TABLE].update).toHaveBeenCalledWith({
        status: 'failed',
        finished_at: expect.any(String),
        error_message: 'Missing env.SUPABASE_URL',
      });
    });

    it('長いメッセージは切り詰める', async () => {
      await failEtlRun('run-1', 'x'.repeat(10001));

      const [update] = mockSupabase.chains[ETL_RUNS_TABLE].update.mock.calls[0];
      expect(update.error_message).toBe('x'.repeat(10000) + '... (truncated)');
    });
  });
});
