import {
  ErrorKind,
  GeocodingError,
  classifyError,
  errorForStatus,
  formatReverseQuery,
  type GeocodeResponse,
  type Geocoder,
  type RateInfo,
  type RequestOptions,
  type RequestParams,
} from '@geobatch/core';
import { buildRequestParams } from './infrastructure/requestParams.js';
import { parseRateLimitHeaders } from './infrastructure/rateLimit.js';
import { ErrorBodySchema, GeocodeResponseSchema } from './infrastructure/responseSchema.js';
import { buildUserAgent } from './infrastructure/userAgent.js';

export const DEFAULT_BASE_URL = 'https://api.opencagedata.com/geocode/v1/json';
export const API_KEY_ENV_VAR = 'OPENCAGE_API_KEY';

/** Configuration for `HttpGeocoder`. */
export interface HttpGeocoderConfig {
  /** API key. Default: the `OPENCAGE_API_KEY` environment variable. */
  readonly apiKey?: string;
  /** Default: the public v1 JSON endpoint. */
  readonly baseUrl?: string;
  /** Per-request timeout in milliseconds, unless a call passes its own. Default: `60000`. */
  readonly timeoutMs?: number;
  /** Appended to the `User-Agent` header, e.g. `"MyApp/1.0"`. Parentheses are removed. */
  readonly userAgentComment?: string;
  /** Extra request headers. */
  readonly headers?: Readonly<Record<string, string>>;
  /** `fetch` implementation. Default: the global `fetch`. */
  readonly fetch?: typeof fetch;
  /** Environment to read the API key from. Default: `process.env`. */
  readonly env?: Readonly<Record<string, string | undefined>>;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function resolveApiKey(config: HttpGeocoderConfig): string {
  const apiKey = config.apiKey ?? (config.env ?? process.env)[API_KEY_ENV_VAR];
  if (apiKey === undefined) {
    throw new GeocodingError(
      ErrorKind.INVALID_INPUT,
      `API key not found. Set the ${API_KEY_ENV_VAR} environment variable or pass apiKey explicitly.`,
    );
  }
  if (apiKey.trim() === '') {
    throw new GeocodingError(ErrorKind.INVALID_INPUT, 'API key cannot be empty.');
  }
  return apiKey;
}

/**
 * Single-request client for the geocoding web API over `fetch`.
 *
 * Each call makes exactly one HTTP request; retries are the caller's concern
 * (the batch pipeline wraps calls in its retrying executor). Non-200 responses
 * reject with the typed error for their status, transport faults with a
 * `NetworkError` or `Timeout`, malformed success bodies with `BadResponse`.
 *
 * @example
 * ```typescript
 * const geocoder = new HttpGeocoder({ apiKey: process.env.GEOCODER_KEY, userAgentComment: 'MyApp/1.0' });
 * const response = await geocoder.geocode('Berlin, Germany', { language: 'de', limit: 1 });
 * console.log(response.results[0]?.geometry);
 * ```
 */
export class HttpGeocoder implements Geocoder {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchImpl: typeof fetch;
  readonly userAgent: string;

  constructor(config: HttpGeocoderConfig = {}) {
    this.apiKey = resolveApiKey(config);
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.headers = config.headers ?? {};
    this.fetchImpl = config.fetch ?? fetch;
    this.userAgent = buildUserAgent(config.userAgentComment);
  }

  async geocode(query: string, params: RequestParams = {}, options: RequestOptions = {}): Promise<GeocodeResponse> {
    if (query.trim() === '') {
      throw new GeocodingError(ErrorKind.INVALID_INPUT, 'Query cannot be empty.');
    }
    return this.request(this.buildUrl(query, params), options);
  }

  /** The reverse endpoint answers with a single result, so `limit` is not sent. */
  async reverseGeocode(
    latitude: number,
    longitude: number,
    params: RequestParams = {},
    options: RequestOptions = {},
  ): Promise<GeocodeResponse> {
    const query = formatReverseQuery(latitude, longitude);
    const withoutLimit: RequestParams = Object.fromEntries(Object.entries(params).filter(([name]) => name !== 'limit'));
    return this.request(this.buildUrl(query, withoutLimit), options);
  }

  /** Request URL including the API key. */
  buildUrl(query: string, params: RequestParams = {}): URL {
    const url = new URL(this.baseUrl);
    for (const [name, value] of Object.entries(buildRequestParams(query, this.apiKey, params))) {
      url.searchParams.set(name, value);
    }
    return url;
  }

  private async request(url: URL, options: RequestOptions): Promise<GeocodeResponse> {
    let response: Response;
    let body: string;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { ...this.headers, Accept: 'application/json', 'User-Agent': this.userAgent },
        signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      throw classifyError(error).error;
    }

    const headerRate = parseRateLimitHeaders(response.headers);
    if (response.status !== 200) {
      throw this.errorForResponse(response.status, body, headerRate);
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new GeocodingError(ErrorKind.BAD_RESPONSE, `Failed to parse successful JSON response: ${messageOf(error)}`, {
        cause: error,
      });
    }

    const parsed = GeocodeResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new GeocodingError(
        ErrorKind.BAD_RESPONSE,
        'Parsed response is missing essential fields (status, results).',
        { cause: parsed.error },
      );
    }

    const data = parsed.data;
    return data.rate === undefined && headerRate !== undefined ? { ...data, rate: headerRate } : data;
  }

  private errorForResponse(status: number, body: string, headerRate: RateInfo | undefined): GeocodingError {
    let message = `API request failed with status ${String(status)}`;
    let rate = headerRate;

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      message =
        body === '' ? `${message} (Could not parse error details from empty response body)` : `${message}: ${body}`;
      return errorForStatus(status, message, rate);
    }

    const parsed = ErrorBodySchema.safeParse(json);
    if (parsed.success) {
      const apiMessage = parsed.data.status?.message;
      if (apiMessage !== undefined && apiMessage !== '') message = apiMessage;
      if (rate === undefined && (status === 402 || status === 429)) rate = parsed.data.rate;
    }
    return errorForStatus(status, message, rate);
  }
}
