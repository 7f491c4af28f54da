import { GeocodeCommand } from '../model/BatchJob.js';
import { isGeocodingError } from '../errors/GeocodingError.js';
import { formatReverseQuery, isDecimal } from './Coordinates.js';

/** Options the row parser reads. A subset of `ResolvedBatchOptions`. */
export interface RowParserOptions {
  readonly inputColumns: readonly number[] | null;
  readonly command: GeocodeCommand | null;
}

/**
 * Outcome of parsing one input row.
 *
 * A skip is never an error: `reason` is published as a `row:skipped` event and
 * the run continues. `command` is `'skip'` only when the selected columns are
 * missing from the row, before a command could be chosen.
 */
export type ParsedRow =
  | { readonly query: string; readonly command: GeocodeCommand }
  | { readonly query: null; readonly command: GeocodeCommand | 'skip'; readonly reason: string };

const MIN_QUERY_LENGTH = 2;

function selectFields(row: readonly string[], columns: readonly number[] | null): string[] | null {
  if (columns === null) return row.map((field) => field.trim());

  const selected: string[] = [];
  for (const column of columns) {
    const field = row[column - 1];
    if (field === undefined) return null;
    selected.push(field.trim());
  }
  return selected;
}

function detectCommand(parts: readonly string[], options: RowParserOptions): GeocodeCommand {
  if (options.command !== null) return options.command;
  if (options.inputColumns?.length === 2 && parts.length === 2 && parts.every(isDecimal)) {
    return GeocodeCommand.REVERSE;
  }
  return GeocodeCommand.FORWARD;
}

/** Turn one raw input row into a normalized query or a skip decision. */
export function parseRow(row: readonly string[], rowId: number, options: RowParserOptions): ParsedRow {
  const parts = selectFields(row, options.inputColumns);
  if (parts === null) {
    return {
      query: null,
      command: 'skip',
      reason: `L${String(rowId)}: Missing input column index in row [${row.join(', ')}]`,
    };
  }

  const command = detectCommand(parts, options);

  if (parts.every((part) => part === '')) {
    return { query: null, command, reason: `L${String(rowId)}: No query data found in selected columns` };
  }

  let query: string;
  if (command === GeocodeCommand.REVERSE) {
    const [lat, lng] = parts;
    if (parts.length !== 2 || lat === undefined || lng === undefined) {
      return {
        query: null,
        command,
        reason: `L${String(rowId)}: Expected 2 columns for reverse geocoding, found ${String(parts.length)}`,
      };
    }
    try {
      query = formatReverseQuery(lat, lng);
    } catch (error) {
      if (!isGeocodingError(error)) throw error;
      return { query: null, command, reason: `L${String(rowId)}: ${error.message}` };
    }
  } else {
    query = parts.filter((part) => part !== '').join(', ');
  }

  if (query.trim().length < MIN_QUERY_LENGTH) {
    return { query: null, command, reason: `L${String(rowId)}: Query '${query}' is too short (< 2 chars)` };
  }

  return { query, command };
}
