/**
 * API レート制限
 *
 * @description トークンバケットで1分あたりのリクエスト数と最小間隔を制御。
 * リトライを含む全ての送信前に acquire() を呼ぶ前提
 */

/** 時刻取得と待機（テストでは差し替える） */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterOptions {
  /** 1分あたりの最大リクエスト数（デフォルト: 60） */
  requestsPerMinute?: number;
  /** 最小リクエスト間隔（ミリ秒、デフォルト: 1000） */
  minIntervalMs?: number;
  clock?: Clock;
}

const MS_PER_MINUTE = 60_000;

export class RateLimiter {
  private readonly requestsPerMinute: number;
  private readonly minIntervalMs: number;
  private readonly clock: Clock;
  private tokens: number;
  private refilledAt: number;
  private lastRequestAt: number | null = null;

  constructor(options?: RateLimiterOptions) {
    this.requestsPerMinute = options?.requestsPerMinute ?? 60;
    this.minIntervalMs = options?.minIntervalMs ?? 1000;
    this.clock = options?.clock ?? systemClock;
    this.tokens = this.requestsPerMinute;
    this.refilledAt = this.clock.now();
  }

  private refill(now: number): void {
    const tokensToAdd = ((now - this.refilledAt) / MS_PER_MINUTE) * this.requestsPerMinute;
    this.tokens = Math.min(this.requestsPerMinute, this.tokens + tokensToAdd);
    this.refilledAt = now;
  }

  private waitTime(now: number): number {
    this.refill(now);

    if (this.tokens < 1) {
      // 1トークン補充されるまで
      return Math.ceil((1 - this.tokens) * (MS_PER_MINUTE / this.requestsPerMinute));
    }

    if (this.lastRequestAt === null) {
      return 0;
    }
    return Math.max(0, this.minIntervalMs - (now - this.lastRequestAt));
  }

  /**
   * 1リクエスト分のトークンを消費する。必要なら待機する
   *
   * @returns 待機した時間（ミリ秒）
   */
  async acquire(): Promise<number> {
    const waitMs = this.waitTime(this.clock.now());
    if (waitMs > 0) {
      await this.clock.sleep(waitMs);
    }

    const now = this.clock.now();
    this.refill(now);
    this.tokens -= 1;
    this.lastRequestAt = now;
    return waitMs;
  }
}
