import type { GeocodeResponse, GeocodeResult } from './GeocodeResponse.js';
import type { GeocodingError } from '../errors/GeocodingError.js';

/** Which single-request operation a row is sent through. */
export const GeocodeCommand = {
  FORWARD: 'forward',
  REVERSE: 'reverse',
} as const;

export type GeocodeCommand = (typeof GeocodeCommand)[keyof typeof GeocodeCommand];

/** One accepted input row on its way to a worker. */
export interface Job {
  /** 1-based input row number (header excluded). */
  readonly rowId: number;
  /** Forward query text, or `"<lat>,<lng>"` for reverse jobs. */
  readonly query: string;
  readonly originalRow: readonly string[];
  readonly command: GeocodeCommand;
}

export type BatchOutcome =
  | { readonly type: 'result'; readonly result: GeocodeResult; readonly response: GeocodeResponse }
  | { readonly type: 'error'; readonly error: GeocodingError }
  | { readonly type: 'none' };

/** What a worker hands to the writer for one job. */
export interface BatchResult {
  readonly rowId: number;
  readonly success: boolean;
  readonly outcome: BatchOutcome;
  readonly originalRow: readonly string[];
}

export function createJob(
  rowId: number,
  query: string,
  originalRow: readonly string[],
  command: GeocodeCommand,
): Job {
  return Object.freeze({ rowId, query, originalRow: Object.freeze([...originalRow]), command });
}

export function successResult(job: Job, response: GeocodeResponse, result: GeocodeResult): BatchResult {
  return Object.freeze<BatchResult>({
    rowId: job.rowId,
    success: true,
    outcome: { type: 'result', result, response },
    originalRow: job.originalRow,
  });
}

export function failureResult(job: Job, error: GeocodingError): BatchResult {
  return Object.freeze<BatchResult>({
    rowId: job.rowId,
    success: false,
    outcome: { type: 'error', error },
    originalRow: job.originalRow,
  });
}
