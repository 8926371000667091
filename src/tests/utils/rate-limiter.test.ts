import { vi, describe, it, expect, afterEach } from 'vitest';
import { RateLimiter, type Clock } from '@/lib/utils/rate-limiter';

function createTestClock() {
  let current = 0;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += ms;
    },
  };
  return {
    clock,
    sleeps,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('rate-limiter.ts', () => {
  it('トークンがあり間隔制限もなければ待機しない', async () => {
    const { clock, sleeps } = createTestClock();
    const limiter = new RateLimiter({ requestsPerMinute: 120, minIntervalMs: 0, clock });

    await expect(limiter.acquire()).resolves.toBe(0);
    await expect(limiter.acquire()).resolves.toBe(0);
    expect(sleeps).toEqual([]);
  });

  it('最小間隔を空けて2回目を取得する', async () => {
    const { clock, sleeps } = createTestClock();
    const limiter = new RateLimiter({ requestsPerMinute: 120, minIntervalMs: 500, clock });

    await expect(limiter.acquire()).resolves.toBe(0);
    await expect(limiter.acquire()).resolves.toBe(500);
    expect(sleeps).toEqual([500]);
  });

  it('最小間隔が経過していれば待機しない', async () => {
    const { clock, advance } = createTestClock();
    const limiter = new RateLimiter({ requestsPerMinute: 120, minIntervalMs: 500, clock });

    await limiter.acquire();
    advance(800);

    await expect(limiter.acquire()).resolves.toBe(0);
  });

  it('トークン枯渇時は1トークン補充されるまで待機する', async () => {
    const { clock, sleeps } = createTestClock();
    // 2/分 → 1トークン30秒
    const limiter = new RateLimiter({ requestsPerMinute: 2, minIntervalMs: 0, clock });

    await limiter.acquire();
    await limiter.acquire();

    await expect(limiter.acquire()).resolves.toBe(30000);
    await expect(limiter.acquire()).resolves.toBe(30000);
    expect(sleeps).toEqual([30000, 30000]);
  });

  it('長時間空いてもバケット容量を超えて貯まらない', async () => {
    const { clock, advance } = createTestClock();
    const limiter = new RateLimiter({ requestsPerMinute: 2, minIntervalMs: 0, clock });

    await limiter.acquire();
    await limiter.acquire();
    advance(600000);

    await expect(limiter.acquire()).resolves.toBe(0);
    await expect(limiter.acquire()).resolves.toBe(0);
    await expect(limiter.acquire()).resolves.toBe(30000);
  });

  describe('既定のクロック', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('setTimeout で待機する', async () => {
      vi.useFakeTimers();
      const limiter = new RateLimiter({ requestsPerMinute: 120, minIntervalMs: 500 });
      await limiter.acquire();

      let waited: number | undefined;
      const second = limiter.acquire().then((ms) => {
        waited = ms;
      });

      await vi.advanceTimersByTimeAsync(499);
      expect(waited).toBeUndefined();

      await vi.advanceTimersByTimeAsync(1);
      await second;
      expect(waited).toBe(500);
    });
  });
});
