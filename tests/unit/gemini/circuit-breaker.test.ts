/**
 * Unit tests for the summarizer circuit breaker
 *
 * @see src/services/gemini/circuit-breaker.ts
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

import { ContentError, TransientError } from '../../../src/errors.js';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  isServerError,
} from '../../../src/services/gemini/circuit-breaker.js';
import { httpError } from './helpers.js';

const fail = (error: Error) => async (): Promise<string> => {
  throw error;
};
const succeed = async (): Promise<string> => 'ok';

describe('isServerError', () => {
  it('counts 5xx, 408 and 429 statuses', () => {
    expect(isServerError(httpError(500, 'Internal'))).toBe(true);
    expect(isServerError(httpError(503, 'Unavailable'))).toBe(true);
    expect(isServerError(httpError(408, 'Request Timeout'))).toBe(true);
    expect(isServerError(httpError(429, 'Too Many Requests'))).toBe(true);
  });

  it('ignores client errors', () => {
    expect(isServerError(httpError(400, 'Bad Request'))).toBe(false);
    expect(isServerError(httpError(403, 'Forbidden'))).toBe(false);
    expect(isServerError(new ContentError('malformed'))).toBe(false);
  });

  it('counts network failures by message or cause code', () => {
    expect(isServerError(new Error('fetch failed'))).toBe(true);
    const cause = Object.assign(new Error('connect'), { code: 'ECONNREFUSED' });
    expect(isServerError(new Error('request failed', { cause }))).toBe(true);
  });

  it('counts TransientError and nothing that is not an Error', () => {
    expect(isServerError(new TransientError('slow'))).toBe(true);
    expect(isServerError('boom')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  let now: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    now = 0;
    breaker = new CircuitBreaker({ failureThreshold: 3, recoveryTimeMs: 1000, now: () => now });
  });

  async function trip(): Promise<void> {
    for (let i = 0; i < 3; i++) {
      await breaker.execute(fail(httpError(500, 'Internal'))).catch(() => undefined);
    }
  }

  it('opens after the failure threshold and rejects without calling', async () => {
    await trip();
    expect(breaker.snapshot()).toEqual({ state: 'open', consecutiveFailures: 0, trips: 1, retryInMs: 1000 });

    const fn = vi.fn(succeed);
    const error = await breaker.execute(fn).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CircuitBreakerOpenError);
    expect(error).toMatchObject({ timeToRecovery: 1000 });
    expect(fn).not.toHaveBeenCalled();
  });

  it('counts down the time left while open', async () => {
    await trip();
    now = 400;

    expect(breaker.snapshot().retryInMs).toBe(600);
  });

  it('resets the failure count on success', async () => {
    await breaker.execute(fail(httpError(500, 'Internal'))).catch(() => undefined);
    await breaker.execute(fail(httpError(500, 'Internal'))).catch(() => undefined);
    await breaker.execute(succeed);
    await breaker.execute(fail(httpError(500, 'Internal'))).catch(() => undefined);

    expect(breaker.snapshot()).toEqual({ state: 'closed', consecutiveFailures: 1, trips: 0, retryInMs: null });
  });

  it('leaves the state alone for client errors', async () => {
    for (let i = 0; i < 5; i++) {
      await breaker.execute(fail(httpError(400, 'Bad Request'))).catch(() => undefined);
    }
    expect(breaker.snapshot()).toMatchObject({ state: 'closed', consecutiveFailures: 0 });
  });

  it('half-opens after the cooldown and closes after two successes', async () => {
    await trip();
    now = 1000;
    expect(breaker.snapshot().state).toBe('half-open');

    await breaker.execute(succeed);
    expect(breaker.snapshot().state).toBe('half-open');
    await breaker.execute(succeed);
    expect(breaker.snapshot()).toEqual({ state: 'closed', consecutiveFailures: 0, trips: 0, retryInMs: null });
  });

  it('reopens on a failure while half-open and doubles the cooldown', async () => {
    await trip();
    now = 1000;
    await breaker.execute(fail(httpError(502, 'Bad Gateway'))).catch(() => undefined);

    expect(breaker.snapshot()).toMatchObject({ state: 'open', trips: 2, retryInMs: 2000 });
    now = 2999;
    expect(breaker.snapshot().state).toBe('open');
    now = 3000;
    expect(breaker.snapshot().state).toBe('half-open');
  });

  it('caps the cooldown at sixteen times the base', () => {
    expect(breaker.cooldownMs(1)).toBe(1000);
    expect(breaker.cooldownMs(3)).toBe(4000);
    expect(breaker.cooldownMs(5)).toBe(16000);
    expect(breaker.cooldownMs(9)).toBe(16000);
  });
});
