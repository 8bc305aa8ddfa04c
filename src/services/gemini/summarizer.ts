/**
 * Summarizer Client
 *
 * Turns extracted text into a SummaryRecord. Each attempt takes a slot from the
 * shared per-minute limiter, runs through the circuit breaker and parses the
 * response. Failure classes:
 * - TransientError: network, timeout, 408/429/5xx, open circuit. Retried;
 *   once attempts run out it is rethrown with `exhausted = true`.
 * - MalformedResponseError: unparseable JSON or a missing field. Retried;
 *   once attempts run out it becomes a plain ContentError.
 * - ConfigurationError: 401/403. Fatal, never retried.
 * - ContentError: any other 4xx. Not retried.
 *
 * @module services/gemini/summarizer
 */

import { z } from 'zod';

import {
  ConfigurationError,
  ContentError,
  TransientError,
  categorizeStatus,
  httpStatusOf,
  toErrorMessage,
} from '../../errors.js';
import type { SummaryRecord } from '../../models/summary.js';
import { withRetry, type RetryOptions } from '../../utils/backoff.js';
import type { RateLimiterStatus, SlidingWindowRateLimiter } from '../../utils/rate-limiter.js';
import { CircuitBreakerOpenError, type BreakerSnapshot, type CircuitBreaker } from './circuit-breaker.js';
import type { GenerativeModel } from './model.js';
import { buildAnalysisPrompt } from './prompt.js';

/**
 * The response could not be turned into a SummaryRecord. Retryable until
 * attempts run out.
 */
export class MalformedResponseError extends ContentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

/** A string, or a list of strings joined with `separator` */
const joined = (separator: string) =>
  z.preprocess((value) => (isStringList(value) ? value.join(separator) : value), z.string());

const Section = joined('\n');

/** An integer, or a 4-digit string; 0 means unknown */
const Year = z.preprocess(
  (value) => (typeof value === 'string' && /^\s*\d{4}\s*$/.test(value) ? Number(value) : value),
  z.number().int().min(0)
);

/** Unknown keys are dropped by zod's default object parsing */
export const SummaryResponseSchema = z.object({
  title: z.string().trim().min(1, 'title is empty'),
  authors: joined(', '),
  journal: z.string(),
  year: Year,
  background: Section,
  methods: Section,
  results: Section,
  discussion: Section,
  limitations: Section,
  conclusions: Section,
  strengths: Section,
});

export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;

/**
 * Remove a surrounding Markdown code fence (```json ... ```), if any
 */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const match = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * @throws MalformedResponseError when the text is not JSON or misses a field
 */
export function parseSummaryResponse(documentId: string, raw: string): SummaryRecord {
  const body = stripCodeFences(raw);
  if (body === '') {
    throw new MalformedResponseError('Empty response from model');
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new MalformedResponseError(`Response is not valid JSON: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }

  const result = SummaryResponseSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(`Response does not match the summary shape: ${issues}`);
  }

  return { documentId, ...result.data };
}

/**
 * Map a raw model failure to the pipeline taxonomy
 */
export function classifyModelError(error: unknown): Error {
  if (error instanceof TransientError || error instanceof ContentError || error instanceof ConfigurationError) {
    return error;
  }
  if (error instanceof CircuitBreakerOpenError) {
    return new TransientError(error.message, { cause: error });
  }

  const message = toErrorMessage(error);
  const status = httpStatusOf(error);
  if (status !== undefined) {
    switch (categorizeStatus(status)) {
      case 'CONFIGURATION':
        return new ConfigurationError(`Gemini rejected the credentials (HTTP ${status}): ${message}`, {
          cause: error,
        });
      case 'TRANSIENT':
        return new TransientError(message, { cause: error, statusCode: status });
      default:
        return new ContentError(`Gemini rejected the request (HTTP ${status}): ${message}`, {
          cause: error,
        });
    }
  }

  // No status: network failure, timeout or an SDK-level error
  return new TransientError(message, { cause: error });
}

export interface SummarizerOptions {
  requestTimeoutMs: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  /** Replaceable for tests */
  sleep?: RetryOptions['sleep'];
}

export interface SummarizerHealth {
  breaker: BreakerSnapshot;
  quota: RateLimiterStatus;
}

export function formatSummarizerHealth(health: SummarizerHealth): string {
  const { breaker, quota } = health;
  const circuit =
    breaker.state === 'open' && breaker.retryInMs !== null
      ? `circuit open (trip #${breaker.trips}, ${Math.ceil(breaker.retryInMs / 1000)}s left)`
      : breaker.state === 'half-open'
        ? `circuit half-open (trip #${breaker.trips})`
        : `circuit closed (${breaker.consecutiveFailures} recent server error(s))`;
  return `${circuit}, ${quota.requestsRemaining} request(s) left in the rate window`;
}

export class SummarizerClient {
  constructor(
    private readonly model: GenerativeModel,
    private readonly limiter: SlidingWindowRateLimiter,
    private readonly breaker: CircuitBreaker,
    private readonly options: SummarizerOptions
  ) {}

  health(): SummarizerHealth {
    return { breaker: this.breaker.snapshot(), quota: this.limiter.getStatus() };
  }

  /**
   * @throws ContentError for empty input, a rejected request or a response that stayed malformed
   * @throws TransientError with `exhausted = true` once retries are spent
   * @throws ConfigurationError when the service refuses the credentials
   */
  async summarize(documentId: string, text: string): Promise<SummaryRecord> {
    if (text.trim() === '') {
      throw new ContentError(`No text to summarize for ${documentId}`);
    }

    const prompt = buildAnalysisPrompt(text);
    const { maxAttempts } = this.options.retry;

    try {
      return await withRetry(
        async () => {
          await this.limiter.acquire();
          let raw: string;
          try {
            raw = await this.breaker.execute(() =>
              this.model.generate({ prompt, timeoutMs: this.options.requestTimeoutMs })
            );
          } catch (error) {
            throw classifyModelError(error);
          }
          return parseSummaryResponse(documentId, raw);
        },
        (error) => error instanceof TransientError || error instanceof MalformedResponseError,
        { ...this.options.retry, label: 'Summarizer', sleep: this.options.sleep }
      );
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        throw new ContentError(
          `Summary for ${documentId} still malformed after ${maxAttempts} attempt(s): ${error.message}`,
          { cause: error }
        );
      }
      if (error instanceof TransientError) {
        throw new TransientError(
          `Summarizer gave up on ${documentId} after ${maxAttempts} attempt(s): ${error.message}`,
          { cause: error, statusCode: error.statusCode, exhausted: true }
        );
      }
      throw error;
    }
  }
}
