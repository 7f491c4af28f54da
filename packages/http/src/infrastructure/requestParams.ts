import { formatReverseQuery, type RequestParams } from '@geobatch/core';

/**
 * Flatten optional parameters into query-string values.
 *
 * - booleans → `1` / `0`
 * - `bounds` (4 numbers) → comma-joined
 * - `proximity` (lat, lng) → canonical coordinate pair
 * - `countrycode` → upper-cased; lists comma-joined, spaces dropped from strings
 * - other lists → comma-joined
 * - `undefined` → omitted
 */
export function buildRequestParams(query: string, apiKey: string, params: RequestParams = {}): Record<string, string> {
  const out: Record<string, string> = { key: apiKey, q: query };

  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;

    if (typeof value === 'boolean') {
      out[name] = value ? '1' : '0';
    } else if (typeof value === 'object') {
      const items: readonly (string | number)[] = value;
      const [lat, lng] = items;
      if (name === 'proximity' && items.length === 2 && typeof lat === 'number' && typeof lng === 'number') {
        out[name] = formatReverseQuery(lat, lng);
      } else if (name === 'countrycode') {
        out[name] = items.map((item) => String(item).toUpperCase()).join(',');
      } else {
        out[name] = items.map(String).join(',');
      }
    } else if (name === 'countrycode' && typeof value === 'string') {
      out[name] = value.replace(/ /g, '').toUpperCase();
    } else {
      out[name] = String(value);
    }
  }

  return out;
}
