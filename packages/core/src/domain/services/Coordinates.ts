import { ErrorKind, GeocodingError } from '../errors/GeocodingError.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parse a finite decimal number, or return `null`. Rejects empty strings, `Infinity`, `NaN` and hex. */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function isDecimal(text: string): boolean {
  return parseDecimal(text) !== null;
}

function invalidCoordinates(lat: unknown, lng: unknown): GeocodingError {
  return new GeocodingError(
    ErrorKind.INVALID_INPUT,
    `Invalid latitude or longitude provided: must be finite numbers. Got: '${String(lat)}', '${String(lng)}'`,
  );
}

function formatCoordinate(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Format a coordinate pair as the `q` value of a reverse request.
 *
 * Numbers are rendered canonically: integral values with exactly one decimal
 * place (`51` → `"51.0"`), others with default decimal rendering. Two strings
 * are validated as numbers and then joined unchanged, so `"51"` stays `"51"`.
 *
 * @throws GeocodingError of kind `InvalidInput` for non-numeric strings,
 *   non-finite numbers, or a string mixed with a number.
 */
export function formatReverseQuery(lat: number | string, lng: number | string): string {
  if (typeof lat === 'string' && typeof lng === 'string') {
    if (!isDecimal(lat) || !isDecimal(lng)) throw invalidCoordinates(lat, lng);
    return `${lat},${lng}`;
  }

  if (typeof lat !== 'number' || typeof lng !== 'number') throw invalidCoordinates(lat, lng);
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) throw invalidCoordinates(lat, lng);

  return `${formatCoordinate(lat)},${formatCoordinate(lng)}`;
}

/** Split a `"<lat>,<lng>"` query back into numbers. */
export function parseReverseQuery(query: string): { readonly latitude: number; readonly longitude: number } {
  const parts = query.split(',');
  const latitude = parts.length === 2 && parts[0] !== undefined ? parseDecimal(parts[0]) : null;
  const longitude = parts.length === 2 && parts[1] !== undefined ? parseDecimal(parts[1]) : null;
  if (latitude === null || longitude === null) {
    throw new GeocodingError(ErrorKind.INVALID_INPUT, `Malformed coordinate query: '${query}'`);
  }
  return { latitude, longitude };
}
