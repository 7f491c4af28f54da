import type { BatchResult } from '../model/BatchJob.js';
import { ErrorKind } from '../errors/GeocodingError.js';

export const STATUS_MESSAGE_FIELD = 'status_message';
export const RAW_JSON_FIELD = 'raw_json';

const RESULTS_PREFIX = 'results[';
const SEGMENT_PATTERN = /^([^[\]]*)((?:\[\d+\])*)$/;

/** Whether any output field reads beyond the first result, so the request must not be limited to one. */
export function needsAllResults(outputFields: readonly string[]): boolean {
  return outputFields.some((field) => field.startsWith(RESULTS_PREFIX));
}

/**
 * Split `"results[1].components.country"` into `['results', 1, 'components', 'country']`.
 * Returns `null` for malformed paths.
 */
export function parseFieldPath(path: string): (string | number)[] | null {
  if (path.trim() === '') return null;

  const keys: (string | number)[] = [];
  for (const segment of path.split('.')) {
    const match = SEGMENT_PATTERN.exec(segment);
    if (!match) return null;
    const [, name = '', indexes = ''] = match;
    if (name === '' && indexes === '') return null;
    if (name !== '') keys.push(name);
    for (const index of indexes.matchAll(/\[(\d+)\]/g)) {
      keys.push(Number(index[1]));
    }
  }
  return keys;
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Resolve a dotted path through nested objects and arrays. Absent at any step → `undefined`. */
export function getFieldPath(data: unknown, path: string): unknown {
  const keys = parseFieldPath(path);
  if (keys === null) return undefined;

  let current: unknown = data;
  for (const key of keys) {
    if (current === null || current === undefined) return undefined;
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current) || !Object.hasOwn(current, key)) return undefined;
      current = current[key];
    }
  }
  return current;
}

function toCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

/** `OK`, `ZERO_RESULTS`, or the error kind of a failed row. */
export function statusMessage(result: BatchResult): string {
  const { outcome } = result;
  if (result.success) return 'OK';
  if (outcome.type === 'error') {
    return outcome.error.kind === ErrorKind.ZERO_RESULTS ? 'ZERO_RESULTS' : outcome.error.kind;
  }
  return 'UNKNOWN_ERROR';
}

/** Header row: `orig_col_1..n` for the input columns, then the output field names. */
export function buildHeader(originalColumnCount: number, outputFields: readonly string[]): string[] {
  const placeholders = Array.from({ length: originalColumnCount }, (_, i) => `orig_col_${String(i + 1)}`);
  return [...placeholders, ...outputFields];
}

/**
 * Project one result into an output row: the original fields followed by one
 * cell per output field. Cells for failed rows are empty except `status_message`.
 */
export function projectRow(result: BatchResult, outputFields: readonly string[]): string[] {
  const row = [...result.originalRow];
  const { outcome } = result;

  for (const field of outputFields) {
    if (field === STATUS_MESSAGE_FIELD) {
      row.push(statusMessage(result));
    } else if (!result.success || outcome.type !== 'result') {
      row.push('');
    } else if (field === RAW_JSON_FIELD) {
      row.push(JSON.stringify(outcome.result));
    } else if (field.startsWith(RESULTS_PREFIX)) {
      row.push(toCell(getFieldPath(outcome.response, field)));
    } else {
      row.push(toCell(getFieldPath(outcome.result, field)));
    }
  }
  return row;
}
