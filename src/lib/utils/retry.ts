/**
 * 指数バックオフリトライユーティリティ
 *
 * @description 429/5xx エラー・ネットワークエラー時に指数バックオフでリトライ
 */

export interface RetryOptions {
  /** 最大リトライ回数（デフォルト: 5） */
  maxRetries?: number;
  /** 基本遅延時間（ミリ秒、デフォルト: 500） */
  baseDelayMs?: number;
  /** 最大遅延時間（ミリ秒、デフォルト: 32000） */
  maxDelayMs?: number;
  /** ジッター幅（ミリ秒、デフォルト: 100） */
  jitterMs?: number;
  /** リトライ対象のステータスコード */
  retryStatusCodes?: number[];
  /** リトライ時のコールバック */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** 各試行（初回を含む、1始まり）の直前に待つ処理。レート制限の取得など */
  beforeAttempt?: (attempt: number) => Promise<unknown> | void;
}

/** 試行ごとに作り直すリクエスト設定（タイムアウト用の signal など） */
export type RequestInitFactory = (attempt: number) => RequestInit;

export interface HttpErrorOptions {
  /** HTTP ステータスコード */
  statusCode?: number;
  /** レスポンスボディ（エラー詳細の解析用） */
  body?: string;
  /** 元のエラー */
  cause?: unknown;
}

const DEFAULT_RETRY_STATUS_CODES = [429, 500, 502, 503, 504];

/**
 * リトライ可能なエラー
 */
export class RetryableError extends Error {
  readonly statusCode?: number;
  readonly body?: string;

  constructor(message: string, options: HttpErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'RetryableError';
    this.statusCode = options.statusCode;
    this.body = options.body;
  }
}

/**
 * リトライ不可能なエラー（即座に失敗）
 */
export class NonRetryableError extends Error {
  readonly statusCode?: number;
  readonly body?: string;

  constructor(message: string, options: HttpErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'NonRetryableError';
    this.statusCode = options.statusCode;
    this.body = options.body;
  }
}

/**
 * ネットワーク層のエラーか判定
 *
 * Node.js の fetch は接続失敗時に TypeError('fetch failed')、
 * AbortSignal.timeout 超過時に name='TimeoutError' の DOMException を投げる
 */
export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    error instanceof TypeError ||
    error.name === 'TimeoutError' ||
    error.message.includes('fetch')
  );
}

function hasRetryStatusCode(error: Error, retryStatusCodes: number[]): boolean {
  return (
    'statusCode' in error &&
    typeof error.statusCode === 'number' &&
    retryStatusCodes.includes(error.statusCode)
  );
}

/**
 * 指定時間スリープ
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * ジッター付きの遅延時間を計算
 */
function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  // 指数バックオフ: baseDelay * 2^attempt
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = Math.random() * jitterMs;
  return cappedDelay + jitter;
}

/**
 * 指数バックオフリトライでラップされた関数を実行
 *
 * @example
 * ```typescript
 * const result = await withRetry(
 *   async () => {
 *     const response = await fetch(url);
 *     if (!response.ok) {
 *       throw new RetryableError('Request failed', { statusCode: response.status });
 *     }
 *     return response.json();
 *   },
 *   { maxRetries: 3, baseDelayMs: 1000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions
): Promise<T> {
  const {
    maxRetries = 5,
    baseDelayMs = 500,
    maxDelayMs = 32000,
    jitterMs = 100,
    retryStatusCodes = DEFAULT_RETRY_STATUS_CODES,
    onRetry,
    beforeAttempt,
  } = options ?? {};

  for (let attempt = 0; ; attempt++) {
    await beforeAttempt?.(attempt + 1);

    try {
      return await fn();
    } catch (error) {
      if (error instanceof NonRetryableError || !(error instanceof Error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        throw error;
      }

      const isRetryable =
        error instanceof RetryableError ||
        hasRetryStatusCode(error, retryStatusCodes) ||
        isNetworkError(error);

      if (!isRetryable) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);
      onRetry?.(attempt + 1, error, delayMs);

      await sleep(delayMs);
    }
  }
}

/**
 * レスポンスボディを安全に読み取る（読み取り失敗時は undefined）
 */
async function readBody(response: Response): Promise<string | undefined> {
  try {
    return await response.text();
  } catch {
    return undefined;
  }
}

/**
 * fetch をリトライ付きでラップ
 *
 * 非 2xx の場合はステータスとボディを保持したエラーを投げる。
 * init に関数を渡すと試行ごとに呼び出す（AbortSignal.timeout を試行単位にする場合）
 */
export async function fetchWithRetry(
  url: string,
  init?: RequestInit | RequestInitFactory,
  retryOptions?: RetryOptions
): Promise<Response> {
  const retryStatusCodes = retryOptions?.retryStatusCodes ?? DEFAULT_RETRY_STATUS_CODES;
  let attempt = 0;

  return withRetry(async () => {
    attempt += 1;
    const response = await fetch(url, typeof init === 'function' ? init(attempt) : init);

    if (response.ok) {
      return response;
    }

    const statusCode = response.status;
    const body = await readBody(response);
    const message = `HTTP ${statusCode}: ${response.statusText}`;

    if (retryStatusCodes.includes(statusCode)) {
      throw new RetryableError(message, { statusCode, body });
    }
    throw new NonRetryableError(message, { statusCode, body });
  }, retryOptions);
}
