/**
 * Circuit breaker shared by the language model clients
 *
 * Only transient provider failures (unavailable, timeout, quota) trip the
 * breaker. Auth and request errors are the caller's problem and leave the
 * state unchanged.
 *
 * @module services/generation/llm/circuit-breaker
 */

import { isTransientProviderError } from './client.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 1,
};

/** Recovery time never grows past 16x the base */
const MAX_RECOVERY_MULTIPLIER = 16;

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreakerOpenError extends Error {
  readonly code = 'CIRCUIT_OPEN';

  constructor(
    message: string,
    public readonly timeToRecovery: number
  ) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  /** Consecutive trips double the recovery time */
  private consecutiveTrips = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    return this.config.recoveryTimeMs * Math.min(Math.pow(2, exponent), MAX_RECOVERY_MULTIPLIER);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === 'OPEN') {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isTransientProviderError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === 'OPEN' ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
  }

  private checkRecovery(): void {
    if (this.state === 'OPEN' && this.lastFailureTime !== null) {
      const recoveryTime = this.getRecoveryTimeMs();
      if (this.now() - this.lastFailureTime >= recoveryTime) {
        console.error(
          `[CircuitBreaker] OPEN -> HALF_OPEN (recovery: ${recoveryTime}ms, trip #${this.consecutiveTrips})`
        );
        this.state = 'HALF_OPEN';
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, HALF_OPEN -> CLOSED');
        this.reset();
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    console.error(
      `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.state = 'OPEN';
      this.successCount = 0;
      console.error(
        `[CircuitBreaker] -> OPEN (trip #${this.consecutiveTrips}, recovery: ${this.getRecoveryTimeMs()}ms)`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (this.now() - this.lastFailureTime));
  }
}
