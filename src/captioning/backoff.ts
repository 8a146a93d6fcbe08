export interface BackoffSettings {
  backoffBaseMs: number;
  backoffMaxMs: number;
  jitterMs: number;
}

/**
 * Delay before attempt `attempt + 1`: `base * 2^(attempt-1)` plus up to
 * `jitterMs` of random jitter, capped at `backoffMaxMs`. A provider retry-after
 * hint raises the delay but is not capped.
 */
export function computeBackoffDelay(
  attempt: number,
  settings: BackoffSettings,
  retryAfterMs?: number,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const base = settings.backoffBaseMs * Math.pow(2, exponent);
  const jitter = Math.floor(random() * settings.jitterMs);
  const delay = Math.min(base + jitter, settings.backoffMaxMs);
  if (retryAfterMs !== undefined && retryAfterMs > delay) {
    return retryAfterMs;
  }
  return delay;
}
