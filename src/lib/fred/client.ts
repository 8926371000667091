/**
 * FRED API クライアント
 *
 * @description レート制限、リトライ、ログ、レスポンス検証、エラー分類に対応
 * @see https://fred.stlouisfed.org/docs/api/fred/
 */

import type { z } from 'zod';
import { RateLimiter } from '../utils/rate-limiter';
import { fetchWithRetry, isNetworkError, NonRetryableError, RetryableError } from '../utils/retry';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import {
  MalformedResponseError,
  SourceUnavailableError,
  UnknownSeriesError,
} from '../etl/errors';
import {
  FredErrorResponseSchema,
  FredObservationsResponseSchema,
  FredSeriesResponseSchema,
  type FredObservation,
  type FredSeriesInfo,
} from './types';

const BASE_URL = 'https://api.stlouisfed.org/fred';

/** FRED欠損値マーカー */
export const FRED_MISSING_VALUE = '.';

/** 存在しない series_id に対する FRED のエラーメッセージ */
const SERIES_NOT_FOUND_PATTERN = /series does not exist/i;

export interface FredClientOptions {
  /** API キー（省略時は環境変数 FRED_API_KEY を使用） */
  apiKey?: string;
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export interface ObservationRange {
  /** 取得開始日 (YYYY-MM-DD、含む) */
  observationStart?: string;
  /** 取得終了日 (YYYY-MM-DD、含む) */
  observationEnd?: string;
}

/**
 * エラーレスポンスのボディから error_message を取り出す
 */
function parseErrorMessage(body: string | undefined): string | undefined {
  if (!body) {
    return undefined;
  }
  try {
    const parsed = FredErrorResponseSchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error_message : undefined;
  } catch {
    return undefined;
  }
}

/**
 * FRED API クライアント
 */
export class FredClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options?: FredClientOptions) {
    const apiKey = options?.apiKey ?? process.env.FRED_API_KEY;
    if (!apiKey) {
      throw new Error('FRED API key is required. Set FRED_API_KEY environment variable.');
    }

    this.apiKey = apiKey;
    this.timeoutMs = options?.timeoutMs ?? 30000;
    this.logger = createLogger({ module: 'fred-client', ...options?.logContext });
  }

  /**
   * APIリクエストを実行し、スキーマで検証したボディを返す
   */
  private async request<S extends z.ZodTypeAny>(
    endpoint: string,
    seriesId: string,
    schema: S,
    params?: Record<string, string | number | undefined>
  ): Promise<z.infer<S>> {
    const url = new URL(`${BASE_URL}${endpoint}`);
    url.searchParams.append('api_key', this.apiKey);
    url.searchParams.append('file_type', 'json');
    url.searchParams.append('series_id', seriesId);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined && value !== '') {
          url.searchParams.append(key, String(value));
        }
      }
    }

    this.logger.debug('FRED API request', { endpoint, seriesId, params });

    let text: string;
    try {
      const response = await fetchWithRetry(
        url.toString(),
        () => ({
          method: 'GET',
          headers: {
            'Accept': 'application/json',
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        }),
        {
          maxRetries: 5,
          baseDelayMs: 500,
          maxDelayMs: 32000,
          beforeAttempt: async (attempt) => {
            const waitedMs = await getFredRateLimiter().acquire();
            if (waitedMs > 0) {
              this.logger.debug('FRED API rate limit wait', { endpoint, seriesId, attempt, waitedMs });
            }
          },
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn('FRED API request retry', {
              endpoint,
              seriesId,
              attempt,
              delayMs,
              error,
            });
          },
        }
      );
      // タイムアウトはボディ読み取り中にも発生する
      text = await response.text();
    } catch (error) {
      const classified = this.classifyError(seriesId, error);
      this.logger.error('FRED API request failed', {
        endpoint,
        seriesId,
        errorCode: classified.code,
        error: classified,
      });
      throw classified;
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(`FRED ${endpoint} returned non-JSON body for ${seriesId}`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        `FRED ${endpoint} response for ${seriesId} does not match schema: ${parsed.error.message}`,
        { cause: parsed.error }
      );
    }

    this.logger.debug('FRED API response', { endpoint, seriesId });
    return parsed.data;
  }

  /**
   * 通信層の例外を ETL エラーに分類
   */
  private classifyError(
    seriesId: string,
    error: unknown
  ): SourceUnavailableError | UnknownSeriesError {
    if (error instanceof NonRetryableError || error instanceof RetryableError) {
      const { statusCode } = error;
      const apiMessage = parseErrorMessage(error.body);

      if (
        (statusCode === 400 || statusCode === 404) &&
        apiMessage !== undefined &&
        SERIES_NOT_FOUND_PATTERN.test(apiMessage)
      ) {
        return new UnknownSeriesError(seriesId, { cause: error });
      }

      return new SourceUnavailableError(
        `FRED API responded ${error.message}${apiMessage ? ` (${apiMessage})` : ''}`,
        { statusCode, cause: error }
      );
    }

    if (isNetworkError(error)) {
      const reason = error instanceof Error ? error.message : String(error);
      return new SourceUnavailableError(`FRED API unreachable: ${reason}`, { cause: error });
    }

    const reason = error instanceof Error ? error.message : String(error);
    return new SourceUnavailableError(`FRED API request failed: ${reason}`, { cause: error });
  }

  /**
   * 系列のメタ情報を取得
   *
   * @throws {UnknownSeriesError} 系列が存在しない場合
   */
  async getSeriesInfo(seriesId: string): Promise<FredSeriesInfo> {
    const response = await this.request('/series', seriesId, FredSeriesResponseSchema);

    const [info] = response.seriess;
    if (!info) {
      throw new UnknownSeriesError(seriesId);
    }
    return info;
  }

  /**
   * 系列の観測値を取得（値は未加工の文字列、欠損値 "." も含む）
   *
   * @param seriesId FRED series ID (例: 'UNRATE')
   * @param range 取得期間（省略時は全期間）
   */
  async getSeriesObservations(
    seriesId: string,
    range: ObservationRange = {}
  ): Promise<FredObservation[]> {
    const response = await this.request(
      '/series/observations',
      seriesId,
      FredObservationsResponseSchema,
      {
        observation_start: range.observationStart,
        observation_end: range.observationEnd,
        sort_order: 'asc',
      }
    );

    const missing = response.observations.filter((obs) => obs.value === FRED_MISSING_VALUE).length;

    this.logger.info('FRED observations fetched', {
      seriesId,
      observationStart: range.observationStart ?? null,
      total: response.observations.length,
      missing,
    });

    return response.observations;
  }
}

// ============================================
// シングルトン レートリミッター
// ============================================

let fredRateLimiter: RateLimiter | null = null;

/**
 * FRED API 用のレートリミッターを取得
 * 公式制限: 120リクエスト/60秒
 */
export function getFredRateLimiter(): RateLimiter {
  if (!fredRateLimiter) {
    fredRateLimiter = new RateLimiter({
      requestsPerMinute: 120,
      minIntervalMs: 500,
    });
  }
  return fredRateLimiter;
}

export function createFredClient(options?: FredClientOptions): FredClient {
  return new FredClient(options);
}
