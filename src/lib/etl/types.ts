/**
 * ETL パイプライン共通型
 */

/**
 * 取得元から受け取った未加工の観測値
 */
export interface RawObservation {
  /** 観測日（未検証） */
  date: string;
  /** 観測値（未検証の文字列。欠損値マーカーを含みうる） */
  value: string;
}

/**
 * 取得元が返す系列メタ情報
 */
export interface UpstreamSeriesMetadata {
  seriesId: string;
  title: string;
  units: string;
  frequency: string;
  seasonalAdjustment: string;
  observationStart: string;
  observationEnd: string;
  lastUpdated: string;
}

/**
 * series_metadata の1行
 */
export interface SeriesMetadataRecord {
  seriesId: string;
  seriesName: string;
  description: string;
  units: string;
  frequency: string;
  seasonalAdjustment: string;
  /** YYYY-MM-DD */
  observationStart: string | null;
}

/**
 * 正規化済みの観測値（economic_time_series_data の1行）
 */
export interface CanonicalObservation {
  seriesId: string;
  /** YYYY-MM-DD */
  date: string;
  /** NUMERIC(20,10) の正規形文字列 */
  value: string;
  /** ISO 8601 */
  processedAt: string;
}

export interface UpsertCounts {
  inserted: number;
  updated: number;
}
