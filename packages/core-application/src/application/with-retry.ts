import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

/**
 * Exponential backoff: base * 2^(attempt-1), capped, with +/- jitter.
 * `random` is injectable so tests get deterministic delays.
 */
export function computeBackoffMs(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const raw = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = raw * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(raw + jitter));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  sleeper: Sleeper,
  random: () => number = Math.random
): Promise<T> {
  const ctx: RetryContext = { attempt: 0, startedAt: Date.now() };

  for (;;) {
    ctx.attempt++;
    try {
      return await fn();
    } catch (err) {
      ctx.lastError = err;
      if (ctx.attempt >= policy.maxAttempts || !policy.shouldRetry(err, ctx)) throw err;

      const forced = policy.retryAfterMs?.(err);
      await sleeper(forced ?? computeBackoffMs(policy, ctx.attempt, random));
    }
  }
}
