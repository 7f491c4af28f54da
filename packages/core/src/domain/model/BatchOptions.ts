import type { AdmissionGate } from '../ports/AdmissionGate.js';
import type { RequestParams } from '../ports/Geocoder.js';
import { BatchProcessingError } from '../errors/GeocodingError.js';
import { GeocodeCommand } from './BatchJob.js';

/** What a worker does with a row whose request failed. */
export const ErrorPolicy = {
  /** Write the row with its error kind in `status_message` and continue. */
  LOG: 'log',
  /** Drop the row silently and continue. */
  SKIP: 'skip',
  /** Abort the whole run. */
  FAIL: 'fail',
} as const;

export type ErrorPolicy = (typeof ErrorPolicy)[keyof typeof ErrorPolicy];

export const DEFAULT_OUTPUT_FIELDS: readonly string[] = [
  'formatted',
  'geometry.lat',
  'geometry.lng',
  'confidence',
  'components._type',
  'status_message',
];

/** Configuration for a batch geocoding run. */
export interface BatchOptions {
  /** Number of concurrent workers. Default: `4`. Clamped to `1` for constrained-tier credentials. */
  readonly workers?: number;
  /** Retries per request after the first attempt. Default: `5`. */
  readonly retries?: number;
  /** Per-request timeout in milliseconds. Default: `60000`. */
  readonly timeoutMs?: number;
  /**
   * 1-based input columns that form the query, in order. When set, the input is
   * read without a header row. Two numeric columns select reverse geocoding.
   * Default: all columns, header row expected.
   */
  readonly inputColumns?: readonly number[];
  /** Output columns appended to each row: dotted result paths, `status_message` or `raw_json`. */
  readonly outputFields?: readonly string[];
  /** Default: `'log'`. */
  readonly onError?: ErrorPolicy;
  /** Write rows in input order instead of completion order. Default: `false`. */
  readonly ordered?: boolean;
  /** Publish `job:progress` events. Default: `true`. */
  readonly progress?: boolean;
  /** Stop after this many input rows. Default: no limit. */
  readonly limit?: number;
  /** Extra query parameters sent with every request. */
  readonly extraParams?: RequestParams;
  /** Shared gate bounding in-flight requests. Default: none (bounded only by `workers`). */
  readonly admissionGate?: AdmissionGate;
  /** Force one command for every row instead of detecting it. */
  readonly command?: GeocodeCommand;
  /** First retry delay in milliseconds. Default: `1000`. */
  readonly retryBaseDelayMs?: number;
  /** Backoff multiplier per attempt. Default: `2`. */
  readonly retryFactor?: number;
  /** Random extra share of each delay, `0`–`1`. Default: `0.1`. */
  readonly retryJitter?: number;
  /** Upper bound for a single retry delay in milliseconds. Default: `60000`. */
  readonly retryMaxDelayMs?: number;
  /** Capacity of the job and result channels. Default: `1000`. */
  readonly channelCapacity?: number;
}

/** `BatchOptions` with every default applied. */
export interface ResolvedBatchOptions {
  readonly workers: number;
  readonly retries: number;
  readonly timeoutMs: number;
  readonly inputColumns: readonly number[] | null;
  readonly outputFields: readonly string[];
  readonly onError: ErrorPolicy;
  readonly ordered: boolean;
  readonly progress: boolean;
  readonly limit: number | null;
  readonly extraParams: RequestParams;
  readonly admissionGate: AdmissionGate | null;
  readonly command: GeocodeCommand | null;
  readonly retryBaseDelayMs: number;
  readonly retryFactor: number;
  readonly retryJitter: number;
  readonly retryMaxDelayMs: number;
  readonly channelCapacity: number;
}

const ERROR_POLICIES: readonly string[] = Object.values(ErrorPolicy);
const COMMANDS: readonly string[] = Object.values(GeocodeCommand);

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new BatchProcessingError(`Invalid '${name}' option: ${String(value)}. Must be an integer >= ${String(min)}.`);
  }
}

function assertNumber(name: string, value: number, min: number): void {
  if (!Number.isFinite(value) || value < min) {
    throw new BatchProcessingError(`Invalid '${name}' option: ${String(value)}. Must be a number >= ${String(min)}.`);
  }
}

/**
 * Apply defaults and validate. Values that cannot come from the type system
 * (plain-JS callers, options parsed from strings) are checked here too.
 *
 * @throws BatchProcessingError on the first invalid option.
 */
export function resolveBatchOptions(options: BatchOptions = {}): ResolvedBatchOptions {
  const onError: string = options.onError ?? ErrorPolicy.LOG;
  if (!ERROR_POLICIES.includes(onError)) {
    throw new BatchProcessingError(`Invalid 'onError' option: '${onError}'. Must be 'log', 'skip', or 'fail'.`);
  }

  const command: string | null = options.command ?? null;
  if (command !== null && !COMMANDS.includes(command)) {
    throw new BatchProcessingError(`Invalid 'command' option: '${command}'. Must be 'forward' or 'reverse'.`);
  }

  const resolved: ResolvedBatchOptions = {
    workers: options.workers ?? 4,
    retries: options.retries ?? 5,
    timeoutMs: options.timeoutMs ?? 60_000,
    inputColumns: options.inputColumns ? Object.freeze([...options.inputColumns]) : null,
    outputFields: Object.freeze([...(options.outputFields ?? DEFAULT_OUTPUT_FIELDS)]),
    onError: options.onError ?? ErrorPolicy.LOG,
    ordered: options.ordered ?? false,
    progress: options.progress ?? true,
    limit: options.limit ?? null,
    extraParams: Object.freeze({ ...options.extraParams }),
    admissionGate: options.admissionGate ?? null,
    command: options.command ?? null,
    retryBaseDelayMs: options.retryBaseDelayMs ?? 1000,
    retryFactor: options.retryFactor ?? 2,
    retryJitter: options.retryJitter ?? 0.1,
    retryMaxDelayMs: options.retryMaxDelayMs ?? 60_000,
    channelCapacity: options.channelCapacity ?? 1000,
  };

  assertInteger('workers', resolved.workers, 1);
  assertInteger('retries', resolved.retries, 0);
  assertNumber('timeoutMs', resolved.timeoutMs, 1);
  assertInteger('channelCapacity', resolved.channelCapacity, 1);
  assertNumber('retryBaseDelayMs', resolved.retryBaseDelayMs, 0);
  assertNumber('retryFactor', resolved.retryFactor, 1);
  assertNumber('retryMaxDelayMs', resolved.retryMaxDelayMs, 0);
  if (!(resolved.retryJitter >= 0 && resolved.retryJitter <= 1)) {
    throw new BatchProcessingError(`Invalid 'retryJitter' option: ${String(resolved.retryJitter)}. Must be between 0 and 1.`);
  }
  if (resolved.limit !== null) assertInteger('limit', resolved.limit, 0);
  if (resolved.inputColumns !== null) {
    if (resolved.inputColumns.length === 0) {
      throw new BatchProcessingError(`Invalid 'inputColumns' option: must name at least one column.`);
    }
    for (const column of resolved.inputColumns) assertInteger('inputColumns', column, 1);
  }

  return Object.freeze(resolved);
}
