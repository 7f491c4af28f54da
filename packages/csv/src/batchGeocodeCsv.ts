import {
  BatchGeocoder,
  FilePathSink,
  FilePathSource,
  type BatchOptions,
  type BatchSummary,
  type DataSink,
  type DataSource,
  type DomainEvent,
  type Geocoder,
} from '@geobatch/core';
import { CsvFormat, type CsvFormatOptions } from './infrastructure/formats/CsvFormat.js';

/** Options for `batchGeocodeCsv()`: pipeline options plus CSV dialect and an event listener. */
export interface BatchGeocodeCsvOptions extends BatchOptions {
  readonly csv?: CsvFormatOptions;
  /** Receives every domain event of the run. */
  readonly onEvent?: (event: DomainEvent) => void;
}

/**
 * Geocode a CSV input into a CSV output in one call.
 *
 * `input` and `output` are file paths or any `DataSource` / `DataSink`.
 *
 * @example
 * ```typescript
 * const summary = await batchGeocodeCsv(new HttpGeocoder(), 'addresses.csv', 'geocoded.csv', {
 *   workers: 2,
 *   onError: 'skip',
 * });
 * ```
 */
export async function batchGeocodeCsv(
  geocoder: Geocoder,
  input: string | DataSource,
  output: string | DataSink,
  options: BatchGeocodeCsvOptions = {},
): Promise<BatchSummary> {
  const { csv, onEvent, ...batchOptions } = options;
  const source = typeof input === 'string' ? new FilePathSource(input) : input;
  const sink = typeof output === 'string' ? new FilePathSink(output) : output;

  const batch = new BatchGeocoder(geocoder, batchOptions).from(source, new CsvFormat(csv)).to(sink);
  if (onEvent) batch.onAny(onEvent);
  return batch.run();
}
