import { describe, it, expect } from 'vitest';
import { buildRequestParams } from '../../src/infrastructure/requestParams.js';

describe('buildRequestParams', () => {
  it('should start with the key and query', () => {
    expect(buildRequestParams('Berlin', 'test-secret')).toEqual({ key: 'test-secret', q: 'Berlin' });
  });

  it('should encode booleans as 1 and 0', () => {
    expect(buildRequestParams('Berlin', 'k', { no_annotations: true, abbrv: false })).toMatchObject({
      no_annotations: '1',
      abbrv: '0',
    });
  });

  it('should format proximity as a coordinate pair', () => {
    expect(buildRequestParams('Berlin', 'k', { proximity: [52, 13.4] }).proximity).toBe('52.0,13.4');
  });

  it('should upper-case country codes', () => {
    expect(buildRequestParams('Berlin', 'k', { countrycode: ['de', 'at'] }).countrycode).toBe('DE,AT');
    expect(buildRequestParams('Berlin', 'k', { countrycode: 'de, at' }).countrycode).toBe('DE,AT');
  });

  it('should join other lists and stringify numbers', () => {
    expect(buildRequestParams('Berlin', 'k', { bounds: [13.1, 52.3, 13.7, 52.7], limit: 1 })).toMatchObject({
      bounds: '13.1,52.3,13.7,52.7',
      limit: '1',
    });
  });

  it('should omit undefined values', () => {
    expect(buildRequestParams('Berlin', 'k', { language: undefined, pretty: 1 })).toEqual({
      key: 'k',
      q: 'Berlin',
      pretty: '1',
    });
  });
});
