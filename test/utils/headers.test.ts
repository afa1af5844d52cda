import { describe, expect, it } from 'vitest';
import { getHeader, mergeHeaders, redactHeaders, REDACTED } from '@/utils/headers';

describe('mergeHeaders', () => {
  it('lets later layers win regardless of case', () => {
    expect(
      mergeHeaders(
        { Accept: 'text/plain', 'X-Client': 'crossnet' },
        undefined,
        { accept: 'application/json' },
        { 'X-Trace': 't-1' }
      )
    ).toEqual({ accept: 'application/json', 'X-Client': 'crossnet', 'X-Trace': 't-1' });
  });

  it('returns an empty object without layers', () => {
    expect(mergeHeaders()).toEqual({});
  });

  it('does not mutate its inputs', () => {
    const defaults = { Accept: 'text/plain' };

    mergeHeaders(defaults, { ACCEPT: 'application/json' });

    expect(defaults).toEqual({ Accept: 'text/plain' });
  });
});

describe('getHeader', () => {
  it('looks names up case-insensitively', () => {
    const headers = { 'Content-Type': 'application/json' };

    expect(getHeader(headers, 'content-type')).toBe('application/json');
    expect(getHeader(headers, 'Accept')).toBeUndefined();
  });
});

describe('redactHeaders', () => {
  it('masks the default sensitive headers', () => {
    expect(
      redactHeaders({
        authorization: 'Basic dGVzdDp0ZXN0',
        Cookie: 'session=test',
        'X-API-Key': 'test-key',
        Accept: '*/*',
      })
    ).toEqual({ authorization: REDACTED, Cookie: REDACTED, 'X-API-Key': REDACTED, Accept: '*/*' });
  });

  it('accepts a custom list', () => {
    expect(redactHeaders({ 'X-Secret': 'test-secret', Authorization: 'Bearer t' }, ['x-secret'])).toEqual({
      'X-Secret': '██',
      Authorization: 'Bearer t',
    });
  });
});
