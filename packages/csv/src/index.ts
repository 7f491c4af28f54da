// Main entry point
export { batchGeocodeCsv } from './batchGeocodeCsv.js';
export type { BatchGeocodeCsvOptions } from './batchGeocodeCsv.js';

// Infrastructure adapters
export { CsvFormat, RowBoundaryScanner, completeRowsEnd } from './infrastructure/formats/CsvFormat.js';
export type { CsvFormatOptions } from './infrastructure/formats/CsvFormat.js';
