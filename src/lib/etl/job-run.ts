/**
 * ETL 実行ログ管理
 *
 * @description etl_runs テーブルへの記録。
 * 記録の失敗はログに残すのみで、パイプラインの結果には影響させない
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { createAdminClient } from '../supabase/admin';
import { createLogger } from '../utils/logger';
import type { RunSummary } from './orchestrator';

const logger = createLogger({ module: 'job-run' });

export const ETL_RUNS_TABLE = 'etl_runs';

export type EtlRunStatus = 'running' | 'success' | 'failed';

export interface EtlRunRecord {
  run_id: string;
  status: EtlRunStatus;
  started_at: string;
  finished_at: string | null;
  error_message: string | null;
  meta: Record<string, unknown>;
}

/** error_message 列に保存する最大文字数 */
const MAX_ERROR_MESSAGE_LENGTH = 10000;

function truncate(message: string): string {
  return message.length > MAX_ERROR_MESSAGE_LENGTH
    ? message.slice(0, MAX_ERROR_MESSAGE_LENGTH) + '... (truncated)'
    : message;
}

/**
 * 実行開始を記録
 *
 * @returns 記録できた場合 true
 */
export async function startEtlRun(
  runId: string,
  meta: Record<string, unknown> = {},
  supabase: SupabaseClient = createAdminClient()
): Promise<boolean> {
  const record: EtlRunRecord = {
    run_id: runId,
    status: 'running',
    started_at: new Date().toISOString(),
    finished_at: null,
    error_message: null,
    meta,
  };

  const { error } = await supabase.from(ETL_RUNS_TABLE).insert(record);

  if (error) {
    logger.error('Failed to start ETL run record', { runId, error: error.message });
    return false;
  }

  logger.info('ETL run started', { runId });
  return true;
}

/**
 * 実行完了を記録
 */
export async function completeEtlRun(
  summary: RunSummary,
  supabase: SupabaseClient = createAdminClient()
): Promise<boolean> {
  const failures = summary.series
    .filter((report) => report.state === 'FAILED')
    .map((report) => `${report.seriesId}: ${report.error?.code ?? 'UNEXPECTED'} ${report.error?.message ?? ''}`.trim());

  const update: Partial<EtlRunRecord> = {
    status: summary.success ? 'success' : 'failed',
    finished_at: summary.finishedAt,
    error_message: failures.length > 0 ? truncate(failures.join('; ')) : null,
    meta: {
      succeeded: summary.succeeded,
      failed: summary.failed,
      inserted: summary.totals.inserted,
      updated: summary.totals.updated,
      discarded: summary.totals.discarded,
      durationMs: summary.durationMs,
    },
  };

  const { error } = await supabase
    .from(ETL_RUNS_TABLE)
    .update(update)
    .eq('run_id', summary.runId);

  if (error) {
    logger.error('Failed to complete ETL run record', { runId: summary.runId, error: error.message });
    return false;
  }

  logger.info('ETL run recorded', { runId: summary.runId, status: update.status });
  return true;
}

/**
 * 例外で中断した実行を記録
 */
export async function failEtlRun(
  runId: string,
  errorMessage: string,
  supabase: SupabaseClient = createAdminClient()
): Promise<boolean> {
  const { error } = await supabase
    .from(ETL_RUNS_TABLE)
    .update({
      status: 'failed',
      finished_at: new Date().toISOString(),
      error_message: truncate(errorMessage),
    })
    .eq('run_id', runId);

  if (error) {
    logger.error('Failed to mark ETL run as failed', { runId, error: error.message });
    return false;
  }
  return true;
}
