/**
 * fred/client.ts のユニットテスト
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// mockReset: true に対応: vi.hoisted() 内で参照を保持
// RateLimiterコンストラクタは安定したオブジェクトを返す（リセットされない）
const { stableAcquire, mockFetchWithRetry } = vi.hoisted(() => ({
  stableAcquire: vi.fn(),
  mockFetchWithRetry: vi.fn(),
}));

vi.mock('@/lib/utils/rate-limiter', () => ({
  RateLimiter: class {
    acquire = stableAcquire;
  },
}));

// エラークラスと isNetworkError は実装をそのまま使う
vi.mock('@/lib/utils/retry', async () => {
  const actual = await vi.importActual<typeof import('@/lib/utils/retry')>('@/lib/utils/retry');
  return { ...actual, fetchWithRetry: mockFetchWithRetry };
});

import { FredClient, createFredClient, getFredRateLimiter } from '@/lib/fred/client';
import {
  MalformedResponseError,
  SourceUnavailableError,
  UnknownSeriesError,
} from '@/lib/etl/errors';
import { NonRetryableError, RetryableError } from '@/lib/utils/retry';

function jsonResponse(body: unknown) {
  return { text: vi.fn().mockResolvedValue(JSON.stringify(body)) };
}

const SERIES_INFO = {
  id: 'UNRATE',
  title: 'Unemployment Rate',
  observation_start: '1948-01-01',
  observation_end: '2024-02-01',
  frequency: 'Monthly',
  units: 'Percent',
  seasonal_adjustment: 'Seasonally Adjusted',
  last_updated: '2024-03-08 07:44:02-06',
};

describe('fred/client.ts', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    process.env.FRED_API_KEY = 'test-api-key';
    // mockReset: true でモック実装がクリアされるため、beforeEach で再設定
    stableAcquire.mockResolvedValue(0);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe('コンストラクタ', () => {
    it('env変数からAPIキーを取得する', () => {
      expect(new FredClient()).toBeInstanceOf(FredClient);
    });

    it('オプションのAPIキーを優先する', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ observations: [] }));

      await new FredClient({ apiKey: 'custom-key' }).getSeriesObservations('UNRATE');

      const calledUrl = new URL(mockFetchWithRetry.mock.calls[0][0]);
      expect(calledUrl.searchParams.get('api_key')).toBe('custom-key');
    });

    it('APIキーなしでエラーを投げる', () => {
      delete process.env.FRED_API_KEY;

      expect(() => new FredClient()).toThrow('FRED API key is required');
    });
  });

  describe('getSeriesObservations', () => {
    it('値を文字列のまま返す（欠損値 "." を含む）', async () => {
      mockFetchWithRetry.mockResolvedValue(
        jsonResponse({
          observations: [
            { date: '2024-01-01', value: '3.7', realtime_start: '2024-03-08' },
            { date: '2024-02-01', value: '.', realtime_start: '2024-03-08' },
          ],
        })
      );

      const observations = await new FredClient().getSeriesObservations('UNRATE');

      expect(observations).toEqual([
        { date: '2024-01-01', value: '3.7', realtime_start: '2024-03-08' },
        { date: '2024-02-01', value: '.', realtime_start: '2024-03-08' },
      ]);
    });

    it('クエリパラメータを組み立てる', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ observations: [] }));

      await new FredClient().getSeriesObservations('UNRATE', { observationStart: '2024-01-01' });

      const calledUrl = new URL(mockFetchWithRetry.mock.calls[0][0]);
      expect(calledUrl.origin + calledUrl.pathname).toBe(
        'https://api.stlouisfed.org/fred/series/observations'
      );
      expect(calledUrl.searchParams.get('api_key')).toBe('test-api-key');
      expect(calledUrl.searchParams.get('file_type')).toBe('json');
      expect(calledUrl.searchParams.get('series_id')).toBe('UNRATE');
      expect(calledUrl.searchParams.get('observation_start')).toBe('2024-01-01');
      expect(calledUrl.searchParams.get('sort_order')).toBe('asc');
      expect(calledUrl.searchParams.has('observation_end')).toBe(false);
    });

    it('リトライ設定を渡し、タイムアウトは試行ごとに作り直す', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ observations: [] }));

      await new FredClient().getSeriesObservations('UNRATE');

      const [, createInit, retryOptions] = mockFetchWithRetry.mock.calls[0];
      const first = createInit(1);
      const second = createInit(2);
      expect(first.method).toBe('GET');
      expect(first.signal).toBeInstanceOf(AbortSignal);
      expect(second.signal).toBeInstanceOf(AbortSignal);
      expect(second.signal).not.toBe(first.signal);
      expect(retryOptions).toMatchObject({ maxRetries: 5, baseDelayMs: 500, maxDelayMs: 32000 });
    });

    it('各試行の前にレートリミッターのトークンを取得する', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ observations: [] }));
      stableAcquire.mockResolvedValueOnce(0).mockResolvedValueOnce(500);

      await new FredClient().getSeriesObservations('UNRATE');

      const [, , { beforeAttempt }] = mockFetchWithRetry.mock.calls[0];
      expect(stableAcquire).not.toHaveBeenCalled();

      await beforeAttempt(1);
      await beforeAttempt(2);
      expect(stableAcquire).toHaveBeenCalledTimes(2);
    });

    it('JSON でないボディは MalformedResponseError', async () => {
      mockFetchWithRetry.mockResolvedValue({ text: vi.fn().mockResolvedValue('<html></html>') });

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toBeInstanceOf(
        MalformedResponseError
      );
    });

    it('スキーマ不一致は MalformedResponseError', async () => {
      mockFetchWithRetry.mockResolvedValue(
        jsonResponse({ observations: [{ date: '2024-01-01', value: 3.7 }] })
      );

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toMatchObject({
        code: 'MALFORMED_RESPONSE',
      });
    });
  });

  describe('getSeriesInfo', () => {
    it('系列メタ情報を返す', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ seriess: [SERIES_INFO] }));

      const info = await new FredClient().getSeriesInfo('UNRATE');

      expect(info).toEqual(SERIES_INFO);
      const calledUrl = new URL(mockFetchWithRetry.mock.calls[0][0]);
      expect(calledUrl.pathname).toBe('/fred/series');
    });

    it('seriess が空なら UnknownSeriesError', async () => {
      mockFetchWithRetry.mockResolvedValue(jsonResponse({ seriess: [] }));

      await expect(new FredClient().getSeriesInfo('NOPE')).rejects.toThrow(
        'Series does not exist upstream: NOPE'
      );
    });
  });

  describe('エラー分類', () => {
    it('400 "series does not exist" は UnknownSeriesError', async () => {
      mockFetchWithRetry.mockRejectedValue(
        new NonRetryableError('HTTP 400: Bad Request', {
          statusCode: 400,
          body: JSON.stringify({
            error_code: 400,
            error_message: 'Bad Request.  The series does not exist.',
          }),
        })
      );

      const error = await new FredClient().getSeriesInfo('NOPE').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnknownSeriesError);
      expect(error).toMatchObject({ seriesId: 'NOPE', code: 'UNKNOWN_SERIES' });
    });

    it('その他の 400 は SourceUnavailableError（API メッセージ付き）', async () => {
      mockFetchWithRetry.mockRejectedValue(
        new NonRetryableError('HTTP 400: Bad Request', {
          statusCode: 400,
          body: JSON.stringify({
            error_code: 400,
            error_message: 'Bad Request.  Variable api_key is not set.',
          }),
        })
      );

      const error = await new FredClient().getSeriesInfo('UNRATE').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(error).toMatchObject({
        message: 'FRED API responded HTTP 400: Bad Request (Bad Request.  Variable api_key is not set.)',
        statusCode: 400,
      });
    });

    it('リトライを使い切った 429 は SourceUnavailableError', async () => {
      mockFetchWithRetry.mockRejectedValue(
        new RetryableError('HTTP 429: Too Many Requests', { statusCode: 429 })
      );

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toMatchObject({
        code: 'SOURCE_UNAVAILABLE',
        message: 'FRED API responded HTTP 429: Too Many Requests',
        statusCode: 429,
      });
    });

    it('接続失敗は SourceUnavailableError', async () => {
      mockFetchWithRetry.mockRejectedValue(new TypeError('fetch failed'));

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toMatchObject({
        code: 'SOURCE_UNAVAILABLE',
        message: 'FRED API unreachable: fetch failed',
      });
    });

    it('ボディ読み取り中のタイムアウトは SourceUnavailableError', async () => {
      mockFetchWithRetry.mockResolvedValue({
        text: vi
          .fn()
          .mockRejectedValue(
            new DOMException('The operation was aborted due to timeout', 'TimeoutError')
          ),
      });

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toMatchObject({
        code: 'SOURCE_UNAVAILABLE',
        message: 'FRED API unreachable: The operation was aborted due to timeout',
      });
    });

    it('想定外の例外も SourceUnavailableError に包む', async () => {
      mockFetchWithRetry.mockRejectedValue(new Error('boom'));

      await expect(new FredClient().getSeriesObservations('UNRATE')).rejects.toMatchObject({
        code: 'SOURCE_UNAVAILABLE',
        message: 'FRED API request failed: boom',
      });
    });
  });

  describe('シングルトン', () => {
    it('createFredClientで新しいインスタンスを生成する', () => {
      expect(createFredClient()).toBeInstanceOf(FredClient);
    });

    it('getFredRateLimiterは同じインスタンスを返す', () => {
      expect(getFredRateLimiter()).toBe(getFredRateLimiter());
    });
  });
});
