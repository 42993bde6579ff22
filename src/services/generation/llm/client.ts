/**
 * Language model client contract and provider error classification
 *
 * @module services/generation/llm/client
 */

export interface GenerateOptions {
  temperature: number;
  maxTokens: number;
}

export interface GenerateResult {
  text: string;
  model: string;
}

export interface LanguageModelClient {
  readonly provider: string;
  readonly model: string;
  generate(prompt: string, options: GenerateOptions): Promise<GenerateResult>;

  /**
   * Reach the provider without generating text. Bypasses retries and the
   * circuit breaker.
   * @throws ProviderError when the provider or the configured model is unavailable
   */
  checkHealth(): Promise<void>;
}

export type ProviderErrorCode =
  | 'PROVIDER_AUTH'
  | 'PROVIDER_QUOTA'
  | 'PROVIDER_TIMEOUT'
  | 'PROVIDER_UNAVAILABLE'
  | 'PROVIDER_ERROR';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProviderError';
    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Transient failures worth a retry and counted by the circuit breaker */
  get transient(): boolean {
    return (
      this.code === 'PROVIDER_UNAVAILABLE' ||
      this.code === 'PROVIDER_TIMEOUT' ||
      this.code === 'PROVIDER_QUOTA'
    );
  }
}

export function isTransientProviderError(error: unknown): boolean {
  return error instanceof ProviderError && error.transient;
}

/**
 * Map an HTTP status to a provider error code
 */
export function codeForStatus(status: number): ProviderErrorCode {
  if (status === 401 || status === 403) return 'PROVIDER_AUTH';
  if (status === 429) return 'PROVIDER_QUOTA';
  if (status === 408 || status === 504) return 'PROVIDER_TIMEOUT';
  if (status >= 500) return 'PROVIDER_UNAVAILABLE';
  return 'PROVIDER_ERROR';
}

/**
 * Classify an arbitrary failure from a provider call.
 * ProviderErrors pass through unchanged.
 */
export function toProviderError(error: unknown, provider: string): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';
  const cause = error instanceof Error && error.cause instanceof Error ? error.cause : null;
  const causeCode =
    cause !== null && 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  const combined = `${message} ${cause?.message ?? ''} ${causeCode}`;
  const details = { provider, cause: message };

  if (name === 'CircuitBreakerOpenError') {
    return new ProviderError(`${provider} circuit breaker is open: ${message}`, 'PROVIDER_UNAVAILABLE', details);
  }

  if (name === 'AbortError' || name === 'TimeoutError' || /timed? ?out|ETIMEDOUT/i.test(combined)) {
    return new ProviderError(`${provider} request timed out`, 'PROVIDER_TIMEOUT', details);
  }
  const statusMatch = /\b([45]\d\d)\b/.exec(combined);
  if (statusMatch) {
    const status = Number(statusMatch[1]);
    return new ProviderError(`${provider} request failed: ${message}`, codeForStatus(status), {
      ...details,
      status,
    });
  }
  if (/api.?key|unauthori[sz]ed|permission denied/i.test(combined)) {
    return new ProviderError(`${provider} rejected credentials: ${message}`, 'PROVIDER_AUTH', details);
  }
  if (/quota|rate.?limit|resource.?exhausted/i.test(combined)) {
    return new ProviderError(`${provider} quota exceeded: ${message}`, 'PROVIDER_QUOTA', details);
  }
  if (/ECONNREFUSED|ECONNRESET|ENOTFOUND|socket hang up|fetch failed|unavailable|overloaded/i.test(combined)) {
    return new ProviderError(`${provider} is unreachable: ${message}`, 'PROVIDER_UNAVAILABLE', details);
  }
  return new ProviderError(`${provider} request failed: ${message}`, 'PROVIDER_ERROR', details);
}
