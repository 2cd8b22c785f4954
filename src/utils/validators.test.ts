import { describe, expect, it } from 'vitest';
import { PreconditionFailedError } from '../core/errors.js';
import { checkKeyInfoPayload, extractJsonFromResponse, validateAdRecords } from './validators.js';

describe('validateAdRecords', () => {
  it('accepts complete records and drops unknown columns', () => {
    expect(
      validateAdRecords([
        { title: 'A', snippet: 'B', displayed_link: 'c.com', position: '1' },
        { title: 'D', snippet: 'E', displayed_link: 'f.com', extensions: 'Sitelinks' },
      ])
    ).toEqual([
      { title: 'A', snippet: 'B', displayed_link: 'c.com' },
      { title: 'D', snippet: 'E', displayed_link: 'f.com', extensions: 'Sitelinks' },
    ]);
  });

  it('fails the whole batch when any record misses a required field', () => {
    const error = (() => {
      try {
        validateAdRecords([
          { title: 'A', snippet: 'B', displayed_link: 'c.com' },
          { Title: 'A', snippet: 'B' },
        ]);
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(PreconditionFailedError);
    expect(error).toMatchObject({
      violations: [{ row: 2, missingFields: ['title', 'displayed_link'] }],
      message: 'Input records are missing required fields: row 2 (title, displayed_link)',
    });
  });

  it('accepts an empty input', () => {
    expect(validateAdRecords([])).toEqual([]);
  });
});

describe('checkKeyInfoPayload', () => {
  it('recognises the key-info shape', () => {
    expect(checkKeyInfoPayload({ data: { rate_limit: { requests: 10, interval: '10s' } } })).toBe(true);
    expect(checkKeyInfoPayload({ data: { rate_limit: { requests: 1.5, interval: '10s' } } })).toBe(false);
    expect(checkKeyInfoPayload({ data: {} })).toBe(false);
    expect(checkKeyInfoPayload(null)).toBe(false);
  });
});

describe('extractJsonFromResponse', () => {
  it('parses plain JSON of any kind', () => {
    expect(extractJsonFromResponse('{"a": 1}')).toEqual({ a: 1 });
    expect(extractJsonFromResponse('"text"')).toBe('text');
  });

  it('throws when no JSON object can be found', () => {
    expect(() => extractJsonFromResponse('nothing here')).toThrow('no JSON object found in response');
  });

  it('ignores an empty object found inside prose', () => {
    expect(() => extractJsonFromResponse('I cannot analyze this ad. Placeholder {} left.')).toThrow(
      'no JSON object found in response'
    );
  });

  it('still accepts an empty object as the whole response', () => {
    expect(extractJsonFromResponse('{}')).toEqual({});
  });
});
