import { describe, it, expect } from 'vitest';
import { classifyError, errorForStatus, isRetryableKind } from '../../../src/domain/services/ErrorClassifier.js';
import {
  ErrorKind,
  GeocodingError,
  NetworkError,
  RateLimitExceededError,
  ServerError,
} from '../../../src/domain/errors/GeocodingError.js';

describe('errorForStatus', () => {
  it.each([
    [400, ErrorKind.BAD_REQUEST],
    [401, ErrorKind.NOT_AUTHORIZED],
    [402, ErrorKind.RATE_LIMIT_EXCEEDED],
    [403, ErrorKind.FORBIDDEN],
    [404, ErrorKind.NOT_FOUND],
    [405, ErrorKind.METHOD_NOT_ALLOWED],
    [408, ErrorKind.TIMEOUT],
    [410, ErrorKind.REQUEST_TOO_LONG],
    [426, ErrorKind.UPGRADE_REQUIRED],
    [429, ErrorKind.TOO_MANY_REQUESTS],
    [500, ErrorKind.SERVER_ERROR],
    [503, ErrorKind.SERVER_ERROR],
    [418, ErrorKind.UNKNOWN],
  ])('should map HTTP %i to %s', (status, kind) => {
    expect(errorForStatus(status, 'failed').kind).toBe(kind);
  });

  it('should attach quota details to a 402', () => {
    const error = errorForStatus(402, 'quota exceeded', { limit: 2500, remaining: 0, reset: 1700000000 });
    expect(error).toBeInstanceOf(RateLimitExceededError);
    if (error instanceof RateLimitExceededError) {
      expect(error.limit).toBe(2500);
      expect(error.remaining).toBe(0);
      expect(error.resetsAt()?.toISOString()).toBe('2023-11-14T22:13:20.000Z');
    }
  });

  it('should append the status code to server error messages', () => {
    const error = errorForStatus(502, 'upstream down');
    expect(error).toBeInstanceOf(ServerError);
    expect(error.message).toBe('upstream down (HTTP status 502)');
  });
});

describe('isRetryableKind', () => {
  it('should retry only transient kinds', () => {
    const retryable = Object.values(ErrorKind).filter(isRetryableKind);
    expect(retryable.sort()).toEqual(['NetworkError', 'ServerError', 'Timeout', 'TooManyRequests']);
  });
});

describe('classifyError', () => {
  it('should keep the kind of an already classified error', () => {
    const original = new GeocodingError(ErrorKind.FORBIDDEN, 'blocked');
    const classified = classifyError(original);
    expect(classified).toEqual({ kind: ErrorKind.FORBIDDEN, retryable: false, error: original });
  });

  it('should map objects carrying an HTTP status', () => {
    const classified = classifyError(Object.assign(new Error('boom'), { status: 429 }));
    expect(classified.kind).toBe(ErrorKind.TOO_MANY_REQUESTS);
    expect(classified.retryable).toBe(true);
    expect(classified.error.message).toBe('HTTP status error 429');
  });

  it('should treat timeouts as retryable', () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const classified = classifyError(timeout);
    expect(classified.kind).toBe(ErrorKind.TIMEOUT);
    expect(classified.retryable).toBe(true);
  });

  it('should recognise socket errors by code, directly or as the cause', () => {
    const direct = Object.assign(new Error('connect refused'), { code: 'ECONNREFUSED' });
    const wrapped = new TypeError('fetch failed', { cause: Object.assign(new Error('reset'), { code: 'ECONNRESET' }) });

    expect(classifyError(direct).error).toBeInstanceOf(NetworkError);
    expect(classifyError(wrapped).kind).toBe(ErrorKind.NETWORK_ERROR);
    expect(classifyError(wrapped).error.message).toBe('Network error during request: fetch failed');
  });

  it('should map syntax errors to BadResponse', () => {
    const classified = classifyError(new SyntaxError('Unexpected token'));
    expect(classified.kind).toBe(ErrorKind.BAD_RESPONSE);
    expect(classified.retryable).toBe(false);
  });

  it('should map anything unrecognised to a non-retryable Unknown', () => {
    expect(classifyError(new Error('weird'))).toMatchObject({ kind: ErrorKind.UNKNOWN, retryable: false });
    expect(classifyError('plain string').error.message).toBe('plain string');
  });
});
