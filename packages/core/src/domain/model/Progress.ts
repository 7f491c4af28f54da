/** Snapshot of rows queued by the reader and written by the writer. */
export interface BatchProgress {
  readonly rowsQueued: number;
  readonly rowsWritten: number;
  /** Estimated or final row count; `null` while a streamed input is still being read. */
  readonly totalRows: number | null;
  /** Written share of the total (0–100), or `null` while the total is unknown. */
  readonly percentage: number | null;
  readonly elapsedMs: number;
}

/** Final counters emitted with `job:completed` and returned from `run()`. */
export interface BatchSummary {
  /** Input rows consumed, up to the row limit. */
  readonly rowsRead: number;
  readonly rowsQueued: number;
  /** Rows dropped by the row parser or by the `skip` error policy. */
  readonly rowsSkipped: number;
  readonly rowsGeocoded: number;
  /** Rows written with a failure status (`log` policy or zero results). */
  readonly rowsFailed: number;
  readonly rowsWritten: number;
  readonly workers: number;
  readonly elapsedMs: number;
}
