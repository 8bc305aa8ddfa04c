/**
 * Pipeline Error Classes
 *
 * Three thrown categories drive every branch in the orchestrator:
 * - TRANSIENT: network, timeout, quota. Retried with backoff, bounded attempts.
 * - CONTENT: malformed or unparseable input. Skip the document, do not mark it.
 * - CONFIGURATION: schema mismatch, missing credentials, corrupted ledger. Fatal.
 *
 * A document with no derivable text is not an error: the extractor returns it
 * with `extractionFailed` set, and the orchestrator skips it without marking.
 *
 * @module errors
 */

export type ErrorCategory = 'TRANSIENT' | 'CONTENT' | 'CONFIGURATION';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class TransientError extends PipelineError {
  /** Set once every retry attempt has been spent */
  readonly exhausted: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options: { cause?: unknown; statusCode?: number; exhausted?: boolean } = {}
  ) {
    super(message, 'TRANSIENT', { cause: options.cause });
    this.name = 'TransientError';
    this.statusCode = options.statusCode;
    this.exhausted = options.exhausted ?? false;
  }
}

export class ContentError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONTENT', options);
    this.name = 'ContentError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

export class LedgerCorruptionError extends ConfigurationError {
  constructor(
    message: string,
    public readonly location: string,
    public readonly line?: number
  ) {
    super(line === undefined ? `${message} (${location})` : `${message} (${location}:${line})`);
    this.name = 'LedgerCorruptionError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TransientError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pull an HTTP status from a client library error (`status` or `response.status`).
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

/**
 * HTTP status → category. 401/403 are credential problems, not transient ones.
 */
export function categorizeStatus(status: number): ErrorCategory {
  if (status === 401 || status === 403) return 'CONFIGURATION';
  if (status === 408 || status === 429 || status >= 500) return 'TRANSIENT';
  return 'CONTENT';
}
