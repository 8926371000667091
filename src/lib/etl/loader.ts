/**
 * Loader: 系列メタ情報と観測値を DB に永続化する
 *
 * @description
 * - series_metadata は series_id をキーに UPSERT
 * - economic_time_series_data は SQL 関数 upsert_observations を1回呼び出して UPSERT。
 *   関数呼び出しは1ステートメント＝1トランザクションのため、1バッチ全件が反映されるか全件が反映されないかのどちらか
 * - DB エラーはすべて StorageError に変換する
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { createAdminClient } from '../supabase/admin';
import {
  isPostgrestError,
  POSTGREST_ERROR_CODES,
  POSTGRES_ERROR_CODES,
  toStorageError,
} from '../supabase/errors';
import { createLogger, type Logger } from '../utils/logger';
import { StorageError } from './errors';
import type { CanonicalObservation, SeriesMetadataRecord, UpsertCounts } from './types';

export const SERIES_METADATA_TABLE = 'series_metadata';
export const OBSERVATIONS_TABLE = 'economic_time_series_data';
export const UPSERT_OBSERVATIONS_FUNCTION = 'upsert_observations';

export interface ObservationStore {
  /** series_id をキーに INSERT / UPDATE */
  upsertMetadata(metadata: SeriesMetadataRecord): Promise<void>;
  /** 保存済みの最新観測日（ウォーターマーク）。行がなければ null */
  latestObservationDate(seriesId: string): Promise<string | null>;
  /** (series_id, date) をキーに1トランザクションで UPSERT */
  upsertObservations(
    seriesId: string,
    records: readonly CanonicalObservation[]
  ): Promise<UpsertCounts>;
  /** 観測値が残っている系列は削除できない（外部キー RESTRICT） */
  deleteSeriesMetadata(seriesId: string): Promise<void>;
}

const LatestDateRowSchema = z.object({ date: z.string() }).nullable();

const UpsertCountsResultSchema = z
  .array(
    z.object({
      inserted: z.coerce.number().int().nonnegative(),
      updated: z.coerce.number().int().nonnegative(),
    })
  )
  .length(1);

/**
 * Supabase（PostgREST）経由の ObservationStore
 */
export class SupabaseObservationStore implements ObservationStore {
  private readonly client: SupabaseClient;
  private readonly logger: Logger;

  constructor(client?: SupabaseClient, logger?: Logger) {
    this.client = client ?? createAdminClient();
    this.logger = logger ?? createLogger({ module: 'loader' });
  }

  async upsertMetadata(metadata: SeriesMetadataRecord): Promise<void> {
    const { error } = await this.client.from(SERIES_METADATA_TABLE).upsert(
      {
        series_id: metadata.seriesId,
        series_name: metadata.seriesName,
        description: metadata.description,
        units: metadata.units,
        frequency: metadata.frequency,
        seasonal_adjustment: metadata.seasonalAdjustment,
        observation_start: metadata.observationStart,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'series_id' }
    );

    if (error) {
      throw toStorageError(`Upsert ${SERIES_METADATA_TABLE} for ${metadata.seriesId}`, error);
    }

    this.logger.debug('Series metadata upserted', { seriesId: metadata.seriesId });
  }

  async latestObservationDate(seriesId: string): Promise<string | null> {
    const { data, error } = await this.client
      .from(OBSERVATIONS_TABLE)
      .select('date')
      .eq('series_id', seriesId)
      .order('date', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw toStorageError(`Read latest ${OBSERVATIONS_TABLE}.date for ${seriesId}`, error);
    }

    const parsed = LatestDateRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(
        `Unexpected ${OBSERVATIONS_TABLE} row shape for ${seriesId}: ${parsed.error.message}`,
        { cause: parsed.error }
      );
    }

    return parsed.data?.date ?? null;
  }

  async upsertObservations(
    seriesId: string,
    records: readonly CanonicalObservation[]
  ): Promise<UpsertCounts> {
    if (records.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const foreign = records.find((record) => record.seriesId !== seriesId);
    if (foreign) {
      throw new StorageError(
        `Observation for ${foreign.seriesId} passed to upsert batch of ${seriesId}`
      );
    }

    const { data, error } = await this.client.rpc(UPSERT_OBSERVATIONS_FUNCTION, {
      p_series_id: seriesId,
      p_rows: records.map((record) => ({
        date: record.date,
        value: record.value,
        processed_at: record.processedAt,
      })),
    });

    if (error) {
      if (isPostgrestError(error, POSTGREST_ERROR_CODES.FUNCTION_NOT_FOUND)) {
        this.logger.error('Database function not found. Apply supabase/migrations first.', {
          function: UPSERT_OBSERVATIONS_FUNCTION,
        });
      }
      throw toStorageError(`Upsert ${OBSERVATIONS_TABLE} for ${seriesId}`, error);
    }

    const parsed = UpsertCountsResultSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(
        `Unexpected ${UPSERT_OBSERVATIONS_FUNCTION} result for ${seriesId}: ${parsed.error.message}`,
        { cause: parsed.error }
      );
    }

    const [{ inserted, updated }] = parsed.data;
    this.logger.info('Observations upserted', {
      seriesId,
      rowCount: records.length,
      inserted,
      updated,
    });

    return { inserted, updated };
  }

  async deleteSeriesMetadata(seriesId: string): Promise<void> {
    const { error } = await this.client
      .from(SERIES_METADATA_TABLE)
      .delete()
      .eq('series_id', seriesId);

    if (error) {
      const operation = isPostgrestError(error, POSTGRES_ERROR_CODES.FOREIGN_KEY_VIOLATION)
        ? `Delete ${SERIES_METADATA_TABLE} ${seriesId} (observations still reference it)`
        : `Delete ${SERIES_METADATA_TABLE} ${seriesId}`;
      throw toStorageError(operation, error);
    }
  }
}
