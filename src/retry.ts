/**
 * Why an attempt is being retried. Rate-limited attempts wait for the
 * server-supplied Retry-After; transport failures back off linearly.
 */
export type RetryReason = "rate_limited" | "transport";

/**
 * Configuration for the retry logic.
 */
export interface RetryConfig {
  /** Maximum number of retries after the first attempt. 0 disables retry. */
  maxRetries: number;
  /** Wait used when a 429 carries no usable Retry-After header. @default 1 */
  rateLimitFallbackSeconds?: number;
  /** Unit of the linear transport backoff: unit × (attempt + 1). @default 0.5 */
  transportBackoffSeconds?: number;
}

export const DEFAULT_RATE_LIMIT_FALLBACK_SECONDS = 1.0;
export const DEFAULT_TRANSPORT_BACKOFF_SECONDS = 0.5;

/**
 * Parses a Retry-After header value in seconds. Fractional values are kept;
 * absent, unparseable or negative values yield the fallback.
 */
export function parseRetryAfter(
  header: string | null | undefined,
  fallbackSeconds: number = DEFAULT_RATE_LIMIT_FALLBACK_SECONDS,
): number {
  if (header === null || header === undefined || header.trim() === "") {
    return fallbackSeconds;
  }
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return fallbackSeconds;
  }
  return seconds;
}

/**
 * Calculates the delay before the next attempt.
 *
 * @param attempt - Zero-based index of the attempt that just failed.
 * @param reason - Why the attempt failed.
 * @param config - Retry configuration.
 * @param retryAfterSeconds - Retry-After of a rate-limited attempt.
 * @returns Delay in milliseconds.
 */
export function calculateDelay(
  attempt: number,
  reason: RetryReason,
  config: RetryConfig,
  retryAfterSeconds?: number,
): number {
  if (reason === "rate_limited") {
    const seconds =
      retryAfterSeconds ??
      config.rateLimitFallbackSeconds ??
      DEFAULT_RATE_LIMIT_FALLBACK_SECONDS;
    return Math.round(seconds * 1000);
  }

  // 0.5s, 1.0s, 1.5s, ... with the default unit
  const unit = config.transportBackoffSeconds ?? DEFAULT_TRANSPORT_BACKOFF_SECONDS;
  return Math.round(unit * (attempt + 1) * 1000);
}

/**
 * Sleeps for the specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Result of a single attempt, used by the retry executor.
 */
export type AttemptResult<T> =
  | { ok: true; response: T }
  | {
      ok: false;
      /** Error to throw if this attempt is the last one. */
      error: Error;
      /** Why the attempt may be retried; absent means fail immediately. */
      retry?: RetryReason;
      /** Retry-After of a rate-limited attempt, in seconds. */
      retryAfterSeconds?: number;
    };

/**
 * Hooks observed by the executor, mainly for logging.
 */
export interface RetryHooks {
  onRetry?(info: {
    attempt: number;
    reason: RetryReason;
    delayMs: number;
    error: Error;
  }): void;
}

/**
 * Executes an async operation with the attempt-indexed retry policy.
 * At most `maxRetries + 1` attempts are made; there is no overall deadline.
 *
 * @param fn - The operation. Receives the zero-based attempt number.
 * @returns The response of the first successful attempt.
 * @throws The error of the first non-retryable attempt, or of the last attempt.
 */
export async function executeWithRetry<T>(
  fn: (attempt: number) => Promise<AttemptResult<T>>,
  config: RetryConfig,
  hooks: RetryHooks = {},
): Promise<T> {
  const maxRetries = Math.max(0, config.maxRetries);

  for (let attempt = 0; ; attempt++) {
    const result = await fn(attempt);

    if (result.ok) {
      return result.response;
    }

    if (result.retry === undefined || attempt >= maxRetries) {
      throw result.error;
    }

    const delayMs = calculateDelay(
      attempt,
      result.retry,
      config,
      result.retryAfterSeconds,
    );
    hooks.onRetry?.({
      attempt,
      reason: result.retry,
      delayMs,
      error: result.error,
    });
    if (delayMs > 0) {
      await sleep(delayMs);
    }
  }
}
