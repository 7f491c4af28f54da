// Main entry point
export { HttpGeocoder, DEFAULT_BASE_URL, API_KEY_ENV_VAR } from './HttpGeocoder.js';
export type { HttpGeocoderConfig } from './HttpGeocoder.js';
export { VERSION } from './version.js';

// Request and response helpers
export { buildRequestParams } from './infrastructure/requestParams.js';
export { buildUserAgent } from './infrastructure/userAgent.js';
export { parseRateLimitHeaders } from './infrastructure/rateLimit.js';
export { GeocodeResponseSchema, GeocodeResultSchema } from './infrastructure/responseSchema.js';
