/**
 * Response shapes of the geocoding API, keyed exactly as the API sends them so
 * that dotted output paths (`geometry.lat`, `components._type`) address them directly.
 */

export interface Coordinates {
  readonly lat: number;
  readonly lng: number;
}

export interface Bounds {
  readonly northeast: Coordinates;
  readonly southwest: Coordinates;
}

/** Address components. Keys vary by country and place type. */
export interface Components {
  readonly _type?: string;
  readonly _category?: string;
  readonly _normalized_city?: string;
  readonly ISO_3166_1_alpha_2?: string;
  readonly ISO_3166_1_alpha_3?: string;
  readonly city?: string;
  readonly country?: string;
  readonly country_code?: string;
  readonly county?: string;
  readonly house_number?: string;
  readonly postcode?: string;
  readonly road?: string;
  readonly state?: string;
  readonly suburb?: string;
  readonly town?: string;
  readonly village?: string;
  readonly [key: string]: unknown;
}

export interface GeocodeResult {
  readonly formatted?: string;
  readonly geometry?: Coordinates;
  readonly bounds?: Bounds;
  readonly components?: Components;
  readonly confidence?: number;
  readonly annotations?: Readonly<Record<string, unknown>>;
  readonly distance_from_q?: Readonly<Record<string, number>>;
}

/** Rate limit ceiling and counters. Absent for unlimited accounts. */
export interface RateInfo {
  readonly limit?: number;
  readonly remaining?: number;
  readonly reset?: number;
}

export interface ResponseStatus {
  readonly code: number;
  readonly message: string;
}

export interface GeocodeResponse {
  readonly status: ResponseStatus;
  readonly results: readonly GeocodeResult[];
  readonly rate?: RateInfo;
  readonly total_results?: number;
}
