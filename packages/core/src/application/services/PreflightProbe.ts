import type { Geocoder, RequestOptions } from '../../domain/ports/Geocoder.js';
import { ErrorKind } from '../../domain/errors/GeocodingError.js';
import { classifyError } from '../../domain/services/ErrorClassifier.js';

/** Daily request ceiling reported for free-trial credentials. */
export const CONSTRAINED_TIER_RATE_LIMIT = 2500;

const PROBE_LATITUDE = 51.5074;
const PROBE_LONGITUDE = -0.1278;

export interface PreflightReport {
  /** `true` for a constrained-tier credential, `null` when the probe failed. */
  readonly constrainedTier: boolean | null;
  /** Why the probe failed, or `null`. */
  readonly error: string | null;
}

/**
 * Send one minimal reverse request to learn the credential's rate ceiling.
 *
 * Advisory: never rejects. A failed probe is reported through `error`.
 */
export async function probeCredential(geocoder: Geocoder, options?: RequestOptions): Promise<PreflightReport> {
  try {
    const response = await geocoder.reverseGeocode(
      PROBE_LATITUDE,
      PROBE_LONGITUDE,
      { limit: 1, no_annotations: true },
      options,
    );
    return { constrainedTier: response.rate?.limit === CONSTRAINED_TIER_RATE_LIMIT, error: null };
  } catch (raw) {
    const { kind, error } = classifyError(raw);
    if (kind === ErrorKind.NOT_AUTHORIZED || kind === ErrorKind.FORBIDDEN) {
      return { constrainedTier: null, error: `API key is invalid or blocked: ${error.message}` };
    }
    return { constrainedTier: null, error: `API test request failed: ${error.message}` };
  }
}
