/**
 * Circuit breaker in front of the summarization model
 *
 * closed → open after `failureThreshold` server-side failures in a row.
 * open → half-open once the cooldown has passed; the cooldown starts at
 * `recoveryTimeMs` and doubles for each trip that follows a failed recovery,
 * up to 16x. half-open → closed after `halfOpenSuccessThreshold` successes,
 * or straight back to open on one more server-side failure.
 *
 * Server-side means HTTP 408/429/5xx or a network error. A malformed response
 * or a rejected request leaves the state untouched.
 *
 * @module services/gemini/circuit-breaker
 */

import { TransientError, httpStatusOf } from '../../errors.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

type Phase =
  | { state: 'closed'; failures: number }
  | { state: 'open'; openedAt: number; trips: number }
  | { state: 'half-open'; successes: number; trips: number };

const NETWORK_ERROR = /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed|timed out/i;

/**
 * Determine whether an error represents a server-side / transient failure
 * that should trip the circuit breaker.
 */
export function isServerError(error: unknown): boolean {
  if (error instanceof TransientError) return true;
  if (!(error instanceof Error)) return false;

  const status = httpStatusOf(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500;
  }

  const cause = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const causeCode =
    cause instanceof Error && 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  const combined = `${error.message} ${causeMsg} ${causeCode}`;

  if (NETWORK_ERROR.test(combined)) return true;
  if (/rate.?limit|resource.?exhausted|server.?(error|overloaded|unavailable)|service.?unavailable/i.test(combined)) {
    return true;
  }
  return false;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
  /** Replaceable for tests */
  now: () => number;
}

const DEFAULTS: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 2,
  now: Date.now,
};

const MAX_COOLDOWN_DOUBLINGS = 4;

export interface BreakerSnapshot {
  state: CircuitState;
  /** Server-side failures in a row while closed */
  consecutiveFailures: number;
  /** Trips since the circuit was last closed */
  trips: number;
  /** Time left before a call is let through, while open */
  retryInMs: number | null;
}

export class CircuitBreakerOpenError extends Error {
  constructor(
    message: string,
    readonly timeToRecovery: number
  ) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private phase: Phase = { state: 'closed', failures: 0 };

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULTS, ...config };
  }

  /**
   * Cooldown after the given number of trips without a successful recovery
   */
  cooldownMs(trips: number): number {
    const doublings = Math.min(Math.max(0, trips - 1), MAX_COOLDOWN_DOUBLINGS);
    return this.config.recoveryTimeMs * 2 ** doublings;
  }

  /**
   * @throws CircuitBreakerOpenError without calling `fn` while the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const phase = this.advance();
    if (phase.state === 'open') {
      const wait = this.remaining(phase);
      throw new CircuitBreakerOpenError(
        `Summarization paused after repeated server errors, next attempt in ${Math.ceil(wait / 1000)}s`,
        wait
      );
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (isServerError(error)) this.onServerFailure();
      throw error;
    }
    this.onSuccess();
    return result;
  }

  snapshot(): BreakerSnapshot {
    const phase = this.advance();
    switch (phase.state) {
      case 'closed':
        return { state: 'closed', consecutiveFailures: phase.failures, trips: 0, retryInMs: null };
      case 'open':
        return { state: 'open', consecutiveFailures: 0, trips: phase.trips, retryInMs: this.remaining(phase) };
      case 'half-open':
        return { state: 'half-open', consecutiveFailures: 0, trips: phase.trips, retryInMs: null };
    }
  }

  /** Move open → half-open when the cooldown is over */
  private advance(): Phase {
    const phase = this.phase;
    if (phase.state === 'open' && this.remaining(phase) === 0) {
      console.error(`[CircuitBreaker] Cooldown over after trip #${phase.trips}, letting calls through`);
      this.phase = { state: 'half-open', successes: 0, trips: phase.trips };
    }
    return this.phase;
  }

  private remaining(phase: { openedAt: number; trips: number }): number {
    return Math.max(0, phase.openedAt + this.cooldownMs(phase.trips) - this.config.now());
  }

  private onSuccess(): void {
    const phase = this.phase;
    if (phase.state === 'closed') {
      this.phase = { state: 'closed', failures: 0 };
    } else if (phase.state === 'half-open') {
      const successes = phase.successes + 1;
      if (successes >= this.config.halfOpenSuccessThreshold) {
        console.error(`[CircuitBreaker] ${successes} successful call(s) after trip #${phase.trips}, closing`);
        this.phase = { state: 'closed', failures: 0 };
      } else {
        this.phase = { ...phase, successes };
      }
    }
  }

  private onServerFailure(): void {
    const phase = this.phase;
    if (phase.state === 'half-open') {
      this.trip(phase.trips + 1, 'server error while recovering');
    } else if (phase.state === 'closed') {
      const failures = phase.failures + 1;
      if (failures >= this.config.failureThreshold) {
        this.trip(1, `${failures} server errors in a row`);
      } else {
        this.phase = { state: 'closed', failures };
      }
    }
    // Already open: a call that started before the trip, nothing to add
  }

  private trip(trips: number, why: string): void {
    this.phase = { state: 'open', openedAt: this.config.now(), trips };
    console.error(`[CircuitBreaker] Open (${why}), trip #${trips}, cooling down for ${this.cooldownMs(trips)}ms`);
  }
}
