import type { GeocodeResponse } from '../model/GeocodeResponse.js';

/** A single optional query parameter value. `undefined` values are omitted from the request. */
export type RequestParamValue =
  | string
  | number
  | boolean
  | readonly string[]
  | readonly [number, number]
  | readonly [number, number, number, number]
  | undefined;

/** Optional API query parameters (`language`, `countrycode`, `limit`, `no_annotations`, ...). */
export type RequestParams = Readonly<Record<string, RequestParamValue>>;

/** Per-call transport options. */
export interface RequestOptions {
  /** Abort the request after this many milliseconds. */
  readonly timeoutMs?: number;
}

/**
 * Port for the single-request geocoding operations.
 *
 * Implementations reject with any error; the batch pipeline classifies it.
 * `HttpGeocoder` from `@geobatch/http` is the production implementation.
 */
export interface Geocoder {
  /** Forward geocoding: free-text place description to coordinates. */
  geocode(query: string, params?: RequestParams, options?: RequestOptions): Promise<GeocodeResponse>;
  /** Reverse geocoding: coordinate pair to place description. */
  reverseGeocode(
    latitude: number,
    longitude: number,
    params?: RequestParams,
    options?: RequestOptions,
  ): Promise<GeocodeResponse>;
}
