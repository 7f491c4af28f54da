import { describe, it, expect } from 'vitest';
import {
  formatReverseQuery,
  isDecimal,
  parseDecimal,
  parseReverseQuery,
} from '../../../src/domain/services/Coordinates.js';
import { ErrorKind, GeocodingError } from '../../../src/domain/errors/GeocodingError.js';

describe('formatReverseQuery', () => {
  it('should render integral numbers with one decimal place', () => {
    expect(formatReverseQuery(51, 0)).toBe('51.0,0.0');
  });

  it('should render non-integral numbers with default decimal formatting', () => {
    expect(formatReverseQuery(51.5074, -0.1278)).toBe('51.5074,-0.1278');
    expect(formatReverseQuery(-33.5, 151)).toBe('-33.5,151.0');
  });

  it('should pass numeric strings through unchanged', () => {
    expect(formatReverseQuery('51.5074', '-0.1278')).toBe('51.5074,-0.1278');
    expect(formatReverseQuery('51', '0')).toBe('51,0');
  });

  it('should reject non-numeric strings with InvalidInput', () => {
    expect(() => formatReverseQuery('north', '0')).toThrow(GeocodingError);
    try {
      formatReverseQuery('abc', 'def');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GeocodingError);
      if (error instanceof GeocodingError) {
        expect(error.kind).toBe(ErrorKind.INVALID_INPUT);
        expect(error.message).toBe(
          "Invalid latitude or longitude provided: must be finite numbers. Got: 'abc', 'def'",
        );
      }
    }
  });

  it('should reject a string mixed with a number', () => {
    expect(() => formatReverseQuery('51.5', 0)).toThrow(/Invalid latitude or longitude/);
  });

  it('should reject non-finite numbers', () => {
    expect(() => formatReverseQuery(Number.NaN, 0)).toThrow(GeocodingError);
    expect(() => formatReverseQuery(0, Number.POSITIVE_INFINITY)).toThrow(GeocodingError);
  });
});

describe('parseDecimal', () => {
  it.each([
    ['51.5074', 51.5074],
    ['-0.1278', -0.1278],
    [' 12 ', 12],
    ['+3.', 3],
    ['.5', 0.5],
    ['1e3', 1000],
  ])('should parse %j', (text, expected) => {
    expect(parseDecimal(text)).toBe(expected);
  });

  it.each(['', 'abc', '0x1A', 'Infinity', 'NaN', '1,5', '12abc', '1e999'])('should reject %j', (text) => {
    expect(parseDecimal(text)).toBeNull();
    expect(isDecimal(text)).toBe(false);
  });
});

describe('parseReverseQuery', () => {
  it('should split a coordinate query into numbers', () => {
    expect(parseReverseQuery('51.0,0.0')).toEqual({ latitude: 51, longitude: 0 });
  });

  it('should reject malformed queries', () => {
    expect(() => parseReverseQuery('51.0')).toThrow("Malformed coordinate query: '51.0'");
    expect(() => parseReverseQuery('a,b')).toThrow(GeocodingError);
  });
});
