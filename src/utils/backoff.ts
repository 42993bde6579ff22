/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt and is capped at maxDelayMs.
 * Jitter adds +/-25% randomness to prevent thundering herd.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 200) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs: number;
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
  /** Log prefix identifying the retried operation */
  label: string;
  /** Once aborted, no further attempt starts and a pending backoff ends early */
  signal?: AbortSignal;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 200,
  maxDelayMs: 5000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  label: 'Backoff',
};

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 *
 * @returns Delay in milliseconds (always >= 0)
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(attempt: number, config?: Partial<BackoffConfig>): Promise<void> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const delay = calculateBackoffDelay(attempt, cfg);
  console.error(`[${cfg.label}] Attempt ${attempt + 1} failed: waiting ${delay}ms`);
  const signal = cfg.signal;
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delay);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute a function with automatic retry and exponential backoff.
 *
 * Retries on errors that pass the shouldRetry predicate, up to maxAttempts.
 * Non-retryable errors are re-thrown immediately. When config.signal aborts,
 * no further attempt is made.
 *
 * @throws The last error if all attempts fail or the signal aborts
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const attempts = Math.max(1, cfg.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < attempts - 1) {
        await backoffSleep(attempt, cfg);
      }
      if (cfg.signal?.aborted) {
        console.error(`[${cfg.label}] Aborted after ${attempt + 1} attempts`);
        throw lastError;
      }
    }
  }

  console.error(`[${cfg.label}] Giving up after ${attempts} attempts`);
  throw lastError;
}
