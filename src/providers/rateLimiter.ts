export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  }),
};

/**
 * Token bucket holding at most `requestsPerMinute` tokens, refilled continuously.
 * One instance exists per provider and every worker draws from it, so the quota
 * applies to the provider as a whole.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly refillPerMs: number;
  private waiters: Promise<void> = Promise.resolve();

  constructor(
    readonly requestsPerMinute: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!(requestsPerMinute > 0)) {
      throw new Error(`requestsPerMinute must be positive (got ${requestsPerMinute})`);
    }
    this.tokens = requestsPerMinute;
    this.lastRefill = clock.now();
    this.refillPerMs = requestsPerMinute / 60000;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.requestsPerMinute, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = now;
    }
  }

  /**
   * Pushes the next token out by `delayMs`, used when the provider itself
   * reports that the quota is exhausted.
   */
  penalize(delayMs: number): void {
    this.refill();
    this.tokens = Math.min(this.tokens, 1 - delayMs * this.refillPerMs);
  }

  /**
   * Waits for a token. Callers queue in arrival order. Resolves `false` without
   * consuming a token if `signal` is aborted while waiting.
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    const turn = this.waiters.then(() => this.takeToken(signal));
    // A rejected turn is reported to its own caller; the queue keeps moving
    this.waiters = turn.then(() => undefined, () => undefined);
    return turn;
  }

  private async takeToken(signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) return false;
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return true;
      }
      const waitMs = Math.ceil((1 - this.tokens) / this.refillPerMs);
      await this.clock.sleep(waitMs, signal);
    }
  }

  available(): number {
    this.refill();
    return Math.max(0, Math.floor(this.tokens));
  }
}
