/**
 * query.ts — Query string encoding and endpoint URL construction.
 *
 * Nested mappings are flattened with bracket notation:
 *   { team: { employee: { name: 'Scott' } } }  →  team[employee][name]=Scott
 *
 * Keys and values are written in their plain string form; nothing is
 * percent-encoded, so callers must pass URL-safe keys and values.
 * `undefined` values are skipped; `null` is written as `key=null`.
 *
 * Pair order follows the mapping's iteration order. For plain objects that
 * means integer-like keys come first in ascending order, then the remaining
 * keys in insertion order; pass a Map when exact wire order matters.
 */

import { BASE_URL, DEFAULT_API_VERSION } from './session.js';
import type { Query, QueryMapping, QueryValue } from './types.js';

export function isQueryMap(mapping: QueryMapping): mapping is ReadonlyMap<string, QueryValue> {
  return mapping instanceof Map;
}

function entriesOf(mapping: QueryMapping): Iterable<[string, QueryValue]> {
  return isQueryMap(mapping) ? mapping.entries() : Object.entries(mapping);
}

function* pairs(mapping: QueryMapping, prefix?: string): Generator<string> {
  for (const [key, value] of entriesOf(mapping)) {
    if (value === undefined) continue;
    const name = prefix === undefined ? key : `${prefix}[${key}]`;
    if (value !== null && typeof value === 'object') {
      yield* pairs(value, name);
    } else {
      yield `${name}=${String(value)}`;
    }
  }
}

export function toQueryString(mapping: QueryMapping): string {
  return Array.from(pairs(mapping)).join('&');
}

/**
 * parseQueryString — naive inverse used when a string query must be extended.
 *
 * Splits on `&` then `=`, keeping only the first two parts of each pair. Values
 * are not URL-decoded. A pair without `=` maps to an empty string.
 */
export function parseQueryString(query: string): Map<string, string> {
  const parsed = new Map<string, string>();
  for (const pair of query.split('&')) {
    if (pair === '') continue;
    const [key, value = ''] = pair.split('=');
    parsed.set(key, value);
  }
  return parsed;
}

export interface EndpointUrlOptions {
  version?: string;
  query?: Query;
  baseUrl?: string;
}

/**
 * endpointUrl — `{baseUrl}/api/{version}{path}` plus an optional query.
 *
 * A string query is appended verbatim; a mapping is encoded with toQueryString().
 * A mapping that encodes to nothing adds no `?`. The path is not validated.
 */
export function endpointUrl(path: string, options: EndpointUrlOptions = {}): string {
  const { version = DEFAULT_API_VERSION, query, baseUrl = BASE_URL } = options;
  const url = `${baseUrl}/api/${version}${path}`;

  if (query === undefined) return url;
  if (typeof query === 'string') return `${url}?${query}`;

  const encoded = toQueryString(query);
  return encoded === '' ? url : `${url}?${encoded}`;
}
