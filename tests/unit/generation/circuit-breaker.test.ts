/**
 * CircuitBreaker Tests
 *
 * Time is driven by an injected clock.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
} from '../../../src/services/generation/llm/circuit-breaker.js';
import { ProviderError } from '../../../src/services/generation/llm/client.js';

function unavailable(): Promise<never> {
  return Promise.reject(new ProviderError('ollama is unreachable', 'PROVIDER_UNAVAILABLE'));
}

function createBreaker() {
  const clock = { now: 1_000_000 };
  const breaker = new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 1000 }, () => clock.now);
  return { breaker, clock };
}

async function trip(breaker: CircuitBreaker): Promise<void> {
  for (let i = 0; i < 2; i++) {
    await expect(breaker.execute(unavailable)).rejects.toBeInstanceOf(ProviderError);
  }
}

describe('CircuitBreaker', () => {
  it('passes results through while closed', async () => {
    const { breaker } = createBreaker();
    expect(await breaker.execute(async () => 'ok')).toBe('ok');
    expect(breaker.getStatus()).toEqual({
      state: 'CLOSED',
      failureCount: 0,
      lastFailureTime: null,
      timeToRecovery: null,
    });
  });

  it('opens after the failure threshold and rejects without calling through', async () => {
    const { breaker } = createBreaker();
    await trip(breaker);

    const fn = vi.fn(async () => 'never');
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
    expect(breaker.getStatus()).toMatchObject({ state: 'OPEN', failureCount: 2, timeToRecovery: 1000 });
  });

  it('ignores failures that are not transient', async () => {
    const { breaker } = createBreaker();
    for (let i = 0; i < 3; i++) {
      await expect(
        breaker.execute(() => Promise.reject(new ProviderError('bad key', 'PROVIDER_AUTH')))
      ).rejects.toMatchObject({ code: 'PROVIDER_AUTH' });
    }
    expect(breaker.getStatus().state).toBe('CLOSED');
  });

  it('resets the failure count on success', async () => {
    const { breaker } = createBreaker();
    await expect(breaker.execute(unavailable)).rejects.toBeInstanceOf(ProviderError);
    await breaker.execute(async () => 'ok');
    await expect(breaker.execute(unavailable)).rejects.toBeInstanceOf(ProviderError);
    expect(breaker.getStatus()).toMatchObject({ state: 'CLOSED', failureCount: 1 });
  });

  it('half-opens after the recovery time and closes on success', async () => {
    const { breaker, clock } = createBreaker();
    await trip(breaker);

    clock.now += 1000;
    expect(breaker.getStatus().state).toBe('HALF_OPEN');

    expect(await breaker.execute(async () => 'recovered')).toBe('recovered');
    expect(breaker.getStatus().state).toBe('CLOSED');
    expect(breaker.getRecoveryTimeMs()).toBe(1000);
  });

  it('reopens on a half-open failure and doubles the recovery time', async () => {
    const { breaker, clock } = createBreaker();
    await trip(breaker);

    clock.now += 1000;
    await expect(breaker.execute(unavailable)).rejects.toBeInstanceOf(ProviderError);

    expect(breaker.getStatus()).toMatchObject({ state: 'OPEN', timeToRecovery: 2000 });
    expect(breaker.getRecoveryTimeMs()).toBe(2000);
  });

  it('reset closes an open breaker', async () => {
    const { breaker } = createBreaker();
    await trip(breaker);
    breaker.reset();
    expect(breaker.getStatus().state).toBe('CLOSED');
  });
});
