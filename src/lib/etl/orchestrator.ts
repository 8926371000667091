/**
 * Orchestrator: 差分ロード
 *
 * @description レジストリ順に1系列ずつ
 * 1. メタ情報を UPSERT
 * 2. 保存済みの最新観測日（ウォーターマーク）を取得
 * 3. ウォーターマークなし → 全期間を取得
 * 4. ウォーターマークあり → その日を「含めて」以降を取得する。
 *    取得元は過去値を改訂するため、最新保存日も毎回取り直して UPSERT し直す（翌日からにしてはいけない）
 * 5. 正規化 → 6. UPSERT → 7. 結果を記録し、失敗しても次の系列へ進む
 */

import type { SeriesDefinition, SeriesRegistry } from '../fred/series-config';
import { createLogger, type Logger } from '../utils/logger';
import { summarizeError, type ErrorSummary } from './errors';
import type { Extractor } from './extractor';
import type { ObservationStore } from './loader';
import { normalize, type TransformCounts } from './transformer';
import type { SeriesMetadataRecord } from './types';

export const SERIES_STATES = [
  'PENDING',
  'METADATA_SYNCED',
  'FETCHING',
  'TRANSFORMING',
  'LOADING',
  'DONE',
  'FAILED',
] as const;

export type SeriesState = (typeof SERIES_STATES)[number];

export interface SeriesReport {
  seriesId: string;
  /** 最終状態 */
  state: 'DONE' | 'FAILED';
  /** 通過した状態（PENDING から最終状態まで） */
  transitions: SeriesState[];
  /** 失敗した時点の状態 */
  failedAt?: SeriesState;
  /** 取得前のウォーターマーク */
  watermark: string | null;
  /** Extractor に渡した開始日（null = 全期間） */
  requestedStart: string | null;
  /** 取得元の最終更新日時 */
  upstreamLastUpdated?: string;
  fetched: number;
  transform: TransformCounts;
  inserted: number;
  updated: number;
  error?: ErrorSummary;
  durationMs: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  series: SeriesReport[];
  succeeded: string[];
  failed: string[];
  totals: {
    inserted: number;
    updated: number;
    discarded: number;
  };
  /** 全系列が DONE の場合のみ true */
  success: boolean;
}

export interface PipelineDependencies {
  extractor: Extractor;
  store: ObservationStore;
  logger?: Logger;
  /** 現在時刻（テスト用に差し替え可能） */
  clock?: () => Date;
}

export interface RunPipelineOptions {
  runId: string;
  /** ウォーターマークを無視して全期間を取り直す */
  fullRefresh?: boolean;
  /** 取得終了日（含む） */
  observationEnd?: string;
}

/**
 * レジストリ定義を series_metadata 行に変換
 */
export function toSeriesMetadataRecord(definition: SeriesDefinition): SeriesMetadataRecord {
  return {
    seriesId: definition.seriesId,
    seriesName: definition.name,
    description: definition.description,
    units: definition.units,
    frequency: definition.frequency,
    seasonalAdjustment: definition.seasonalAdjustment,
    observationStart: definition.observationStart,
  };
}

/**
 * 増分取得の開始日を決定
 *
 * ウォーターマーク当日を含める（改訂の取り込みのため +1 日しない）
 */
export function resolveFetchStart(watermark: string | null, fullRefresh = false): string | null {
  if (fullRefresh || watermark === null) {
    return null;
  }
  return watermark;
}

/**
 * 1系列を処理（例外は投げず、結果をレポートに記録）
 */
async function processSeries(
  definition: SeriesDefinition,
  deps: Required<PipelineDependencies>,
  options: RunPipelineOptions
): Promise<SeriesReport> {
  const { seriesId } = definition;
  const logger = deps.logger.child({ seriesId });
  const timer = logger.startTimer('Series');

  const report: SeriesReport = {
    seriesId,
    state: 'FAILED',
    transitions: ['PENDING'],
    watermark: null,
    requestedStart: null,
    fetched: 0,
    transform: { accepted: 0, missing: 0, invalid: 0, duplicate: 0 },
    inserted: 0,
    updated: 0,
    durationMs: 0,
  };

  let current: SeriesState = 'PENDING';
  const enter = (state: SeriesState) => {
    current = state;
    report.transitions.push(state);
    logger.debug('Series state changed', { state });
  };

  try {
    await deps.store.upsertMetadata(toSeriesMetadataRecord(definition));
    enter('METADATA_SYNCED');

    report.watermark = await deps.store.latestObservationDate(seriesId);
    report.requestedStart = resolveFetchStart(report.watermark, options.fullRefresh);

    enter('FETCHING');
    logger.info('Fetching series', {
      watermark: report.watermark,
      requestedStart: report.requestedStart,
      observationEnd: options.observationEnd ?? null,
    });
    const extracted = await deps.extractor.fetch(seriesId, {
      startDate: report.requestedStart ?? undefined,
      endDate: options.observationEnd,
    });
    report.fetched = extracted.observations.length;
    report.upstreamLastUpdated = extracted.metadata.lastUpdated;

    enter('TRANSFORMING');
    const transformed = normalize(seriesId, extracted.observations, {
      now: deps.clock(),
      logger,
    });
    report.transform = transformed.counts;

    enter('LOADING');
    const counts = await deps.store.upsertObservations(seriesId, transformed.records);
    report.inserted = counts.inserted;
    report.updated = counts.updated;

    enter('DONE');
    report.state = 'DONE';
    report.durationMs = timer.end({
      fetched: report.fetched,
      inserted: report.inserted,
      updated: report.updated,
    });
  } catch (error) {
    report.failedAt = current;
    report.error = summarizeError(error);
    report.transitions.push('FAILED');
    report.durationMs = timer.endWithError(
      error instanceof Error ? error : new Error(String(error)),
      { state: current, errorCode: report.error.code }
    );
  }

  return report;
}

/**
 * レジストリの全系列を順番に処理する
 *
 * 系列単位の失敗はレポートに記録して次の系列へ進むため、この関数自体は系列の失敗で reject しない
 */
export async function runPipeline(
  registry: SeriesRegistry,
  dependencies: PipelineDependencies,
  options: RunPipelineOptions
): Promise<RunSummary> {
  const deps: Required<PipelineDependencies> = {
    extractor: dependencies.extractor,
    store: dependencies.store,
    logger: (dependencies.logger ?? createLogger({ module: 'orchestrator' })).child({
      runId: options.runId,
    }),
    clock: dependencies.clock ?? (() => new Date()),
  };

  const startedAt = deps.clock();
  deps.logger.info('Pipeline started', {
    seriesCount: registry.length,
    fullRefresh: options.fullRefresh ?? false,
  });

  const reports: SeriesReport[] = [];
  for (const definition of registry) {
    reports.push(await processSeries(definition, deps, options));
  }

  const finishedAt = deps.clock();
  const succeeded = reports.filter((r) => r.state === 'DONE').map((r) => r.seriesId);
  const failed = reports.filter((r) => r.state === 'FAILED').map((r) => r.seriesId);

  const summary: RunSummary = {
    runId: options.runId,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: finishedAt.getTime() - startedAt.getTime(),
    series: reports,
    succeeded,
    failed,
    totals: {
      inserted: reports.reduce((sum, r) => sum + r.inserted, 0),
      updated: reports.reduce((sum, r) => sum + r.updated, 0),
      discarded: reports.reduce(
        (sum, r) => sum + r.transform.missing + r.transform.invalid + r.transform.duplicate,
        0
      ),
    },
    success: failed.length === 0,
  };

  const level = summary.success ? 'info' : 'error';
  deps.logger[level]('Pipeline finished', {
    succeeded: succeeded.length,
    failed: failed.length,
    failedSeries: failed,
    inserted: summary.totals.inserted,
    updated: summary.totals.updated,
    durationMs: summary.durationMs,
  });

  return summary;
}
