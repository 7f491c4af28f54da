import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { BatchProcessingError, BufferSink, BufferSource } from '@geobatch/core';
import type { DomainEvent, GeocodeResponse, Geocoder } from '@geobatch/core';
import { batchGeocodeCsv } from '../../src/batchGeocodeCsv.js';

const TEST_DIR = join(tmpdir(), 'geobatch-test-csv');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function response(formatted: string | null): GeocodeResponse {
  return {
    status: { code: 200, message: 'OK' },
    results: formatted === null ? [] : [{ formatted, geometry: { lat: 1.5, lng: 2 }, confidence: 7 }],
  };
}

/** Answers the probe and every reverse request with one result, forward requests from the query. */
const stubGeocoder: Geocoder = {
  geocode: (query) => Promise.resolve(response(query === 'Atlantis' ? null : `${query} (geocoded)`)),
  reverseGeocode: (latitude, longitude) => Promise.resolve(response(`near ${String(latitude)} ${String(longitude)}`)),
};

describe('batchGeocodeCsv', () => {
  it('should geocode a CSV file into a CSV file', async () => {
    const input = join(TEST_DIR, 'addresses.csv');
    const output = join(TEST_DIR, 'geocoded.csv');
    writeFileSync(input, 'address\n"Berlin, Germany"\nParis\nAtlantis\n');

    const summary = await batchGeocodeCsv(stubGeocoder, input, output, {
      ordered: true,
      outputFields: ['formatted', 'geometry.lat', 'status_message'],
    });

    expect(summary).toMatchObject({ rowsRead: 3, rowsGeocoded: 2, rowsFailed: 1, rowsWritten: 3 });
    expect(readFileSync(output, 'utf-8')).toBe(
      'orig_col_1,formatted,geometry.lat,status_message\n' +
        '"Berlin, Germany","Berlin, Germany (geocoded)",1.5,OK\n' +
        'Paris,Paris (geocoded),1.5,OK\n' +
        'Atlantis,,,ZERO_RESULTS\n',
    );
  });

  it('should reverse geocode selected coordinate columns', async () => {
    const sink = new BufferSink();

    await batchGeocodeCsv(stubGeocoder, new BufferSource('id-1,51.5,-0.12\n'), sink, {
      inputColumns: [2, 3],
      outputFields: ['formatted'],
    });

    expect(sink.toString()).toBe('orig_col_1,orig_col_2,orig_col_3,formatted\nid-1,51.5,-0.12,near 51.5 -0.12\n');
  });

  it('should write with the configured dialect and forward events', async () => {
    const sink = new BufferSink();
    const events: DomainEvent[] = [];

    await batchGeocodeCsv(stubGeocoder, new BufferSource('place;country\nRome;Italy\n'), sink, {
      csv: { delimiter: ';' },
      outputFields: ['formatted'],
      onEvent: (event) => events.push(event),
    });

    expect(sink.toString()).toBe('orig_col_1;orig_col_2;formatted\nRome;Italy;Rome, Italy (geocoded)\n');
    expect(events.map((event) => event.type)).toContain('job:completed');
  });

  it('should reject when the input file is missing', async () => {
    const output = join(TEST_DIR, 'never.csv');
    await expect(batchGeocodeCsv(stubGeocoder, join(TEST_DIR, 'missing.csv'), output)).rejects.toBeInstanceOf(
      BatchProcessingError,
    );
  });
});
