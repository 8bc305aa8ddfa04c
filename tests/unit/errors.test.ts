/**
 * Unit tests for the pipeline error taxonomy
 *
 * @see src/errors.ts
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  ContentError,
  LedgerCorruptionError,
  PipelineError,
  TransientError,
  categorizeStatus,
  httpStatusOf,
  isRetryable,
  toErrorMessage,
} from '../../src/errors.js';

describe('error classes', () => {
  it('carry their category', () => {
    expect(new TransientError('t').category).toBe('TRANSIENT');
    expect(new ContentError('c').category).toBe('CONTENT');
    expect(new ConfigurationError('x').category).toBe('CONFIGURATION');
  });

  it('defaults TransientError to not exhausted', () => {
    const error = new TransientError('quota', { statusCode: 429 });
    expect(error.exhausted).toBe(false);
    expect(error.statusCode).toBe(429);
    expect(error).toBeInstanceOf(PipelineError);
  });

  it('formats LedgerCorruptionError with its location', () => {
    expect(new LedgerCorruptionError('Invalid ledger line', '/data/l.jsonl', 3).message).toBe(
      'Invalid ledger line (/data/l.jsonl:3)'
    );
    expect(new LedgerCorruptionError('Unreadable', '/data/l.db').message).toBe('Unreadable (/data/l.db)');
    expect(new LedgerCorruptionError('x', 'y')).toBeInstanceOf(ConfigurationError);
  });
});

describe('isRetryable', () => {
  it('is true only for TransientError', () => {
    expect(isRetryable(new TransientError('t'))).toBe(true);
    expect(isRetryable(new ContentError('c'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
  });
});

describe('toErrorMessage', () => {
  it('reads Error messages and stringifies anything else', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('text')).toBe('text');
    expect(toErrorMessage(42)).toBe('42');
  });
});

describe('httpStatusOf', () => {
  it('reads status, numeric code and response.status', () => {
    expect(httpStatusOf(Object.assign(new Error('a'), { status: 503 }))).toBe(503);
    expect(httpStatusOf(Object.assign(new Error('b'), { code: 404 }))).toBe(404);
    expect(httpStatusOf(Object.assign(new Error('c'), { response: { status: 429 } }))).toBe(429);
  });

  it('ignores string codes and non-errors', () => {
    expect(httpStatusOf(Object.assign(new Error('d'), { code: 'ECONNRESET' }))).toBeUndefined();
    expect(httpStatusOf({ status: 500 })).toBeUndefined();
  });
});

describe('categorizeStatus', () => {
  it.each([
    [401, 'CONFIGURATION'],
    [403, 'CONFIGURATION'],
    [408, 'TRANSIENT'],
    [429, 'TRANSIENT'],
    [500, 'TRANSIENT'],
    [503, 'TRANSIENT'],
    [400, 'CONTENT'],
    [413, 'CONTENT'],
  ])('maps %i to %s', (status, category) => {
    expect(categorizeStatus(status)).toBe(category);
  });
});
