/**
 * ETL エラー分類
 *
 * @description 取得元・レコード・ストレージの各層で発生するエラー。
 * `code` はログとランサマリーに出力される安定した識別子
 */

export type EtlErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'UNKNOWN_SERIES'
  | 'MALFORMED_RESPONSE'
  | 'INVALID_RECORD'
  | 'STORAGE_ERROR'
  | 'UNEXPECTED';

export abstract class EtlError extends Error {
  abstract readonly code: EtlErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * ネットワーク・認証・レート制限・タイムアウト
 */
export class SourceUnavailableError extends EtlError {
  readonly code = 'SOURCE_UNAVAILABLE';
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'SourceUnavailableError';
    this.statusCode = options?.statusCode;
  }
}

/**
 * 取得元に存在しない series_id
 */
export class UnknownSeriesError extends EtlError {
  readonly code = 'UNKNOWN_SERIES';

  constructor(
    readonly seriesId: string,
    options?: { cause?: unknown }
  ) {
    super(`Series does not exist upstream: ${seriesId}`, options);
    this.name = 'UnknownSeriesError';
  }
}

/**
 * レスポンスが JSON でない、またはスキーマに合わない
 */
export class MalformedResponseError extends EtlError {
  readonly code = 'MALFORMED_RESPONSE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/**
 * 日付・値を変換できないレコード（元の行を保持）
 */
export class InvalidRecordError extends EtlError {
  readonly code = 'INVALID_RECORD';

  constructor(
    message: string,
    readonly rawRecord: { date: string; value: string }
  ) {
    super(message);
    this.name = 'InvalidRecordError';
  }
}

/**
 * 制約違反・接続断など DB 側のエラー
 */
export class StorageError extends EtlError {
  readonly code = 'STORAGE_ERROR';
  /** Postgres / PostgREST のエラーコード（例: 23503） */
  readonly dbCode?: string;

  constructor(message: string, options?: { dbCode?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'StorageError';
    this.dbCode = options?.dbCode;
  }
}

export interface ErrorSummary {
  code: EtlErrorCode;
  message: string;
}

/**
 * 任意の例外をランサマリー用の形に変換
 */
export function summarizeError(error: unknown): ErrorSummary {
  if (error instanceof EtlError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'UNEXPECTED',
    message: error instanceof Error ? error.message : String(error),
  };
}
