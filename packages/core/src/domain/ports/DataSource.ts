/**
 * Port for reading raw input from any origin (file, buffer, stream).
 *
 * `countLines()` is implemented only by sources that can be read twice; the
 * reader uses it to estimate the total for progress reporting. Streamed
 * sources leave it out and the total stays unknown until the input ends.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Count physical lines in the input without consuming it. */
  countLines?(): Promise<number>;
}
