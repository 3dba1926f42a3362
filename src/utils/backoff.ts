/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt (capped at maxDelayMs); jitter adds
 * +/-jitterFraction randomness. Used for bounded per-chunk read retries and
 * summarizer requests.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
  /** Log prefix used when a retry is scheduled */
  label: string;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Non-retryable errors (per shouldRetry) are re-thrown immediately; after
 * maxAttempts the last error is thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const attempts = Math.max(1, cfg.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === attempts - 1) throw error;

      const delay = calculateBackoffDelay(attempt, cfg);
      console.error(
        `[${cfg.label}] Attempt ${attempt + 1}/${attempts} failed: ` +
          `${error instanceof Error ? error.message : String(error)}. Retrying in ${delay}ms`
      );
      await sleep(delay);
    }
  }

  throw lastError;
}
