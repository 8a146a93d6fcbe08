import { describe, it, expect } from 'vitest';
import { Clock, RateLimiter } from '../src/providers/rateLimiter';

/** Clock whose sleep advances time instantly. */
class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.time += ms;
  }
}

describe('RateLimiter', () => {
  it('starts with a full bucket', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(3, clock);

    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(true);
    expect(await limiter.acquire()).toBe(true);
    expect(clock.sleeps).toEqual([]);
    expect(limiter.available()).toBe(0);
  });

  it('waits for the next token once the bucket is empty', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(60, clock);
    for (let i = 0; i < 60; i++) {
      await limiter.acquire();
    }

    expect(await limiter.acquire()).toBe(true);
    expect(clock.sleeps).toEqual([1000]);
    expect(clock.time).toBe(1000);
  });

  it('shares one budget between concurrent callers', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(60, clock);
    for (let i = 0; i < 60; i++) {
      await limiter.acquire();
    }

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.time).toBe(3000);
  });

  it('delays the next token after a penalty', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(60, clock);

    limiter.penalize(5000);

    expect(limiter.available()).toBe(0);
    expect(await limiter.acquire()).toBe(true);
    expect(clock.time).toBe(5000);
  });

  it('gives up without a token when aborted', async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1, clock);
    await limiter.acquire();
    const controller = new AbortController();
    controller.abort();

    expect(await limiter.acquire(controller.signal)).toBe(false);
  });

  it('rejects a non-positive quota', () => {
    expect(() => new RateLimiter(0)).toThrow('requestsPerMinute must be positive');
  });
});
