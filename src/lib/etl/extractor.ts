/**
 * Extractor: 取得元 API から系列メタ情報と観測値（昇順）を取得する
 */

import type { FredClient } from '../fred/client';
import type { RawObservation, UpstreamSeriesMetadata } from './types';

export interface FetchRange {
  /** 取得開始日（含む）。省略時は全期間 */
  startDate?: string;
  /** 取得終了日（含む） */
  endDate?: string;
}

export interface ExtractResult {
  metadata: UpstreamSeriesMetadata;
  /** 日付昇順 */
  observations: RawObservation[];
}

export interface Extractor {
  /**
   * @throws {SourceUnavailableError} 通信・認証・レート制限・タイムアウト
   * @throws {UnknownSeriesError} 取得元に存在しない系列
   * @throws {MalformedResponseError} レスポンスを解釈できない
   */
  fetch(seriesId: string, range?: FetchRange): Promise<ExtractResult>;
}

/** FredExtractor が使うクライアント API */
export type FredSeriesSource = Pick<FredClient, 'getSeriesInfo' | 'getSeriesObservations'>;

/**
 * FRED を取得元とする Extractor
 */
export class FredExtractor implements Extractor {
  constructor(private readonly client: FredSeriesSource) {}

  async fetch(seriesId: string, range: FetchRange = {}): Promise<ExtractResult> {
    const info = await this.client.getSeriesInfo(seriesId);
    const observations = await this.client.getSeriesObservations(seriesId, {
      observationStart: range.startDate,
      observationEnd: range.endDate,
    });

    const sorted = observations
      .map((obs): RawObservation => ({ date: obs.date, value: obs.value }))
      .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    return {
      metadata: {
        seriesId: info.id,
        title: info.title,
        units: info.units,
        frequency: info.frequency,
        seasonalAdjustment: info.seasonal_adjustment,
        observationStart: info.observation_start,
        observationEnd: info.observation_end,
        lastUpdated: info.last_updated,
      },
      observations: sorted,
    };
  }
}
