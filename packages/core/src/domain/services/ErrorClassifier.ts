import {
  ErrorKind,
  GeocodingError,
  NetworkError,
  RateLimitExceededError,
  ServerError,
} from '../errors/GeocodingError.js';
import type { RateLimitDetails } from '../errors/GeocodingError.js';

/** A failure normalized into the taxonomy, with its retry verdict. */
export interface ClassifiedError {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly error: GeocodingError;
}

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  ErrorKind.NETWORK_ERROR,
  ErrorKind.TIMEOUT,
  ErrorKind.TOO_MANY_REQUESTS,
  ErrorKind.SERVER_ERROR,
]);

/** Socket and DNS error codes raised by Node's networking stack and undici. */
const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_CLOSED',
]);

export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/** Map an HTTP status code (other than 200) to a typed error. */
export function errorForStatus(status: number, message: string, rate?: RateLimitDetails): GeocodingError {
  switch (status) {
    case 400:
      return new GeocodingError(ErrorKind.BAD_REQUEST, message);
    case 401:
      return new GeocodingError(ErrorKind.NOT_AUTHORIZED, message);
    case 402:
      return new RateLimitExceededError(message, rate);
    case 403:
      return new GeocodingError(ErrorKind.FORBIDDEN, message);
    case 404:
      return new GeocodingError(ErrorKind.NOT_FOUND, message);
    case 405:
      return new GeocodingError(ErrorKind.METHOD_NOT_ALLOWED, message);
    case 408:
      return new GeocodingError(ErrorKind.TIMEOUT, message);
    case 410:
      return new GeocodingError(ErrorKind.REQUEST_TOO_LONG, message);
    case 426:
      return new GeocodingError(ErrorKind.UPGRADE_REQUIRED, message);
    case 429:
      return new GeocodingError(ErrorKind.TOO_MANY_REQUESTS, message);
    default:
      if (status >= 500) return new ServerError(message, status);
      return new GeocodingError(ErrorKind.UNKNOWN, message);
  }
}

/**
 * Normalize any thrown value into a `ClassifiedError`.
 *
 * Already-classified errors keep their kind. Objects exposing a numeric
 * `status` go through the status table. Anything unrecognized becomes a
 * non-retryable `Unknown`.
 */
export function classifyError(raw: unknown): ClassifiedError {
  const error = toGeocodingError(raw);
  return { kind: error.kind, retryable: isRetryableKind(error.kind), error };
}

function toGeocodingError(raw: unknown): GeocodingError {
  if (raw instanceof GeocodingError) return raw;

  const status = readStatus(raw);
  if (status !== undefined) {
    return errorForStatus(status, `HTTP status error ${String(status)}`);
  }

  if (raw instanceof Error) {
    if (raw.name === 'TimeoutError') {
      return new GeocodingError(ErrorKind.TIMEOUT, `Request timed out: ${raw.message}`, { cause: raw });
    }
    if (isNetworkFault(raw)) {
      return new NetworkError(`Network error during request: ${raw.message}`, raw);
    }
    if (raw instanceof SyntaxError) {
      return new GeocodingError(ErrorKind.BAD_RESPONSE, `Failed to parse response body: ${raw.message}`, {
        cause: raw,
      });
    }
    return new GeocodingError(ErrorKind.UNKNOWN, raw.message, { cause: raw });
  }

  return new GeocodingError(ErrorKind.UNKNOWN, String(raw));
}

function readStatus(raw: unknown): number | undefined {
  if (typeof raw !== 'object' || raw === null) return undefined;
  if (!('status' in raw)) return undefined;
  const status = raw.status;
  return typeof status === 'number' && Number.isInteger(status) && status >= 400 ? status : undefined;
}

function readCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null || !('code' in value)) return undefined;
  return typeof value.code === 'string' ? value.code : undefined;
}

function isNetworkFault(error: Error): boolean {
  const code = readCode(error) ?? readCode(error.cause);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) return true;
  // undici rejects with a bare TypeError('fetch failed') and the socket error as cause
  return error instanceof TypeError && error.message === 'fetch failed';
}
