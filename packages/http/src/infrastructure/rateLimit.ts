import type { RateInfo } from '@geobatch/core';

const INTEGER = /^\d+$/;

function readInteger(headers: Headers, name: string): number | undefined {
  const value = headers.get(name)?.trim();
  return value !== undefined && INTEGER.test(value) ? Number(value) : undefined;
}

/** Rate info from `X-RateLimit-*` headers, or `undefined` when none parse as integers. */
export function parseRateLimitHeaders(headers: Headers): RateInfo | undefined {
  const limit = readInteger(headers, 'X-RateLimit-Limit');
  const remaining = readInteger(headers, 'X-RateLimit-Remaining');
  const reset = readInteger(headers, 'X-RateLimit-Reset');

  if (limit === undefined && remaining === undefined && reset === undefined) return undefined;
  return { limit, remaining, reset };
}
