import type { RetryPolicy, RetrySettings } from "../ports/retry-policy";
import { NetworkError, RemoteRateLimitedError, RemoteServerError } from "./errors";

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxAttempts: 5,
  baseDelayMs: 300,
  maxDelayMs: 5000,
  jitterRatio: 0.2,
};

export function isRetryableTransportError(err: unknown): boolean {
  if (err instanceof NetworkError) return true;
  if (err instanceof RemoteRateLimitedError) return true;
  if (err instanceof RemoteServerError) {
    return err.statusCode === undefined || err.statusCode >= 500;
  }
  return false;
}

export function defaultNetworkRetryPolicy(overrides: Partial<RetrySettings> = {}): RetryPolicy {
  return {
    ...DEFAULT_RETRY_SETTINGS,
    ...overrides,
    shouldRetry: (err) => isRetryableTransportError(err),
    retryAfterMs: (err) =>
      err instanceof RemoteRateLimitedError && err.retryAfterSeconds !== undefined
        ? err.retryAfterSeconds * 1000
        : undefined,
  };
}
