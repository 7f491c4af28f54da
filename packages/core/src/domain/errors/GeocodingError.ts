/**
 * Closed taxonomy of failure kinds.
 *
 * `ZeroResults` is synthesized by the batch pipeline when a request succeeds
 * but returns nothing; every other kind maps to a transport or protocol failure.
 */
export const ErrorKind = {
  INVALID_INPUT: 'InvalidInput',
  NOT_AUTHORIZED: 'NotAuthorized',
  FORBIDDEN: 'Forbidden',
  BAD_REQUEST: 'BadRequest',
  NOT_FOUND: 'NotFound',
  METHOD_NOT_ALLOWED: 'MethodNotAllowed',
  TIMEOUT: 'Timeout',
  REQUEST_TOO_LONG: 'RequestTooLong',
  UPGRADE_REQUIRED: 'UpgradeRequired',
  TOO_MANY_REQUESTS: 'TooManyRequests',
  RATE_LIMIT_EXCEEDED: 'RateLimitExceeded',
  SERVER_ERROR: 'ServerError',
  NETWORK_ERROR: 'NetworkError',
  BAD_RESPONSE: 'BadResponse',
  BATCH_PROCESSING_ERROR: 'BatchProcessingError',
  ZERO_RESULTS: 'ZeroResults',
  UNKNOWN: 'Unknown',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Base class for every error the library raises or records. */
export class GeocodingError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

/** Quota details reported alongside a 402 response. */
export interface RateLimitDetails {
  readonly limit?: number;
  readonly remaining?: number;
  /** Unix timestamp (seconds) when the quota resets. */
  readonly reset?: number;
}

export class RateLimitExceededError extends GeocodingError {
  readonly limit: number | undefined;
  readonly remaining: number | undefined;
  readonly reset: number | undefined;

  constructor(message: string, details: RateLimitDetails = {}) {
    super(ErrorKind.RATE_LIMIT_EXCEEDED, message);
    this.limit = details.limit;
    this.remaining = details.remaining;
    this.reset = details.reset;
  }

  /** Reset time as a `Date`, or `null` when the API did not report one. */
  resetsAt(): Date | null {
    return this.reset === undefined ? null : new Date(this.reset * 1000);
  }
}

export class ServerError extends GeocodingError {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(ErrorKind.SERVER_ERROR, `${message} (HTTP status ${String(statusCode)})`);
    this.statusCode = statusCode;
  }
}

export class NetworkError extends GeocodingError {
  constructor(message: string, cause?: unknown) {
    super(ErrorKind.NETWORK_ERROR, message, { cause });
  }
}

/** Pipeline-level failure: invalid configuration or a fatal condition during a run. */
export class BatchProcessingError extends GeocodingError {
  constructor(message: string, cause?: unknown) {
    super(ErrorKind.BATCH_PROCESSING_ERROR, message, cause === undefined ? undefined : { cause });
  }
}

export function isGeocodingError(value: unknown): value is GeocodingError {
  return value instanceof GeocodingError;
}
