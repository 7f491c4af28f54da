import type { BatchProgress, BatchSummary } from '../model/Progress.js';
import type { GeocodeCommand } from '../model/BatchJob.js';
import type { ErrorKind } from '../errors/GeocodingError.js';

/** Emitted once the preflight probe has answered. */
export interface JobPreflightedEvent {
  readonly type: 'job:preflighted';
  readonly jobId: string;
  /** `null` when the probe failed. */
  readonly constrainedTier: boolean | null;
  readonly timestamp: number;
}

/** Emitted when workers are spawned. `totalRows` is `null` for streamed input. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly workers: number;
  readonly totalRows: number | null;
  readonly timestamp: number;
}

/** Non-fatal advisory, e.g. the worker count was clamped or nothing was written. */
export interface JobWarningEvent {
  readonly type: 'job:warning';
  readonly jobId: string;
  readonly message: string;
  readonly timestamp: number;
}

/** Emitted when a row is queued or written, if progress reporting is enabled. */
export interface JobProgressEvent {
  readonly type: 'job:progress';
  readonly jobId: string;
  readonly progress: BatchProgress;
  readonly timestamp: number;
}

/** Emitted when every row has been written. */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly summary: BatchSummary;
  readonly timestamp: number;
}

/** Emitted when the run aborts on a fatal condition. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly error: string;
  /** Kind of the root cause. */
  readonly errorKind: ErrorKind;
  readonly timestamp: number;
}

/** Emitted for rows the parser rejects and rows dropped by the `skip` policy. */
export interface RowSkippedEvent {
  readonly type: 'row:skipped';
  readonly jobId: string;
  readonly rowId: number;
  readonly reason: string;
  /** Set when the row was dropped after a failed request. */
  readonly errorKind?: ErrorKind;
  readonly timestamp: number;
}

/** Emitted when a worker gets a result for a row. */
export interface RowGeocodedEvent {
  readonly type: 'row:geocoded';
  readonly jobId: string;
  readonly rowId: number;
  readonly command: GeocodeCommand;
  /** Attempts used, including the successful one. */
  readonly attempts: number;
  readonly timestamp: number;
}

/** Emitted when a row is recorded as failed (`log` policy, zero results, or the fatal row under `fail`). */
export interface RowFailedEvent {
  readonly type: 'row:failed';
  readonly jobId: string;
  readonly rowId: number;
  readonly query: string;
  readonly errorKind: ErrorKind;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted before a failed request is retried. */
export interface RequestRetriedEvent {
  readonly type: 'request:retried';
  readonly jobId: string;
  readonly rowId: number;
  /** The attempt that failed (1-based). */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly errorKind: ErrorKind;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobPreflightedEvent
  | JobStartedEvent
  | JobWarningEvent
  | JobProgressEvent
  | JobCompletedEvent
  | JobFailedEvent
  | RowSkippedEvent
  | RowGeocodedEvent
  | RowFailedEvent
  | RequestRetriedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
