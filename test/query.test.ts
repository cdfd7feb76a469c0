import { describe, expect, it } from 'vitest';
import { endpointUrl, parseQueryString, toQueryString } from '../src/client/query.js';

describe('toQueryString', () => {
  it('joins flat pairs in insertion order', () => {
    expect(toQueryString({ Status: 'Live', Size: 10 })).toBe('Status=Live&Size=10');
  });

  it('wraps nested keys in brackets', () => {
    expect(toQueryString({ a: { b: 'v' } })).toBe('a[b]=v');
    expect(toQueryString({ team: { employee: { name: 'Scott' } } })).toBe('team[employee][name]=Scott');
  });

  it('mixes nested and flat pairs', () => {
    expect(toQueryString({ page: 2, filter: { status: 'Live', device: 'Mobile' } })).toBe(
      'page=2&filter[status]=Live&filter[device]=Mobile',
    );
  });

  it('encodes an empty mapping to an empty string', () => {
    expect(toQueryString({})).toBe('');
  });

  it('drops a key whose nested mapping is empty', () => {
    expect(toQueryString({ a: {}, b: 1 })).toBe('b=1');
  });

  it('skips undefined, writes null and keeps falsy values', () => {
    expect(toQueryString({ a: undefined, b: null, c: 0, d: false, e: '' })).toBe('b=null&c=0&d=false&e=');
  });

  it('writes null inside a nested mapping', () => {
    expect(toQueryString({ filter: { status: null } })).toBe('filter[status]=null');
  });

  it('does not percent-encode keys or values', () => {
    expect(toQueryString({ q: 'a b&c' })).toBe('q=a b&c');
  });

  // Plain objects do not keep insertion order for integer-like keys
  it('puts integer-like keys of plain objects first', () => {
    expect(toQueryString({ b: 1, 10: 'x', a: 2, 2: 'y' })).toBe('2=y&10=x&b=1&a=2');
  });

  it('keeps the exact insertion order of a Map', () => {
    const query = new Map<string, string | number>([
      ['b', 1],
      ['10', 'x'],
      ['a', 2],
    ]);
    expect(toQueryString(query)).toBe('b=1&10=x&a=2');
  });

  it('flattens a Map nested inside an object', () => {
    expect(toQueryString({ filter: new Map([['z', 1], ['a', 2]]) })).toBe('filter[z]=1&filter[a]=2');
  });
});

describe('parseQueryString', () => {
  it('splits pairs on & and =', () => {
    expect(Array.from(parseQueryString('Status=Live&Size=10'))).toEqual([
      ['Status', 'Live'],
      ['Size', '10'],
    ]);
  });

  it('keeps only the first two parts and defaults a missing value to empty', () => {
    expect(Array.from(parseQueryString('a=b=c&flag'))).toEqual([
      ['a', 'b'],
      ['flag', ''],
    ]);
  });

  it('leaves encoded values as they are', () => {
    expect(parseQueryString('q=a%20b').get('q')).toBe('a%20b');
  });

  it('returns an empty map for an empty string', () => {
    expect(parseQueryString('').size).toBe(0);
  });
});

describe('endpointUrl', () => {
  it('builds host, api prefix, default version and path', () => {
    expect(endpointUrl('/account')).toBe('https://connect-api.cloudresearch.com/api/v1/account');
  });

  it('appends a string query verbatim', () => {
    expect(endpointUrl('/project', { query: 'x=1' })).toBe(
      'https://connect-api.cloudresearch.com/api/v1/project?x=1',
    );
  });

  it('encodes a mapping query', () => {
    expect(endpointUrl('/project', { query: { Status: 'Paused', Size: 5 } })).toBe(
      'https://connect-api.cloudresearch.com/api/v1/project?Status=Paused&Size=5',
    );
  });

  it('adds no separator for a mapping that encodes to nothing', () => {
    expect(endpointUrl('/project', { query: {} })).toBe('https://connect-api.cloudresearch.com/api/v1/project');
  });

  it('honours version and base url overrides', () => {
    expect(endpointUrl('/account', { version: 'v2', baseUrl: 'https://sandbox.example.test' })).toBe(
      'https://sandbox.example.test/api/v2/account',
    );
  });
});
