import type { DataSource } from './DataSource.js';

export interface ReadRowsOptions {
  /** Whether the first row holds column names (dropped, never yielded). */
  readonly hasHeader: boolean;
}

/**
 * Port for a row-oriented text format (CSV, TSV, ...).
 *
 * Implementations must handle rows spanning chunk boundaries of the source.
 */
export interface TabularFormat {
  /** Stream the data rows of the source as ordered field lists. */
  readRows(source: DataSource, options: ReadRowsOptions): AsyncIterable<readonly string[]>;
  /** Serialize one row, including its line terminator. */
  formatRow(row: readonly string[]): string;
}
