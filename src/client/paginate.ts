/**
 * paginate.ts — Cursor pagination for Connect list endpoints.
 *
 * List endpoints answer with `{ <itemsKey>: [...], nextToken: string | null }`.
 * The token is echoed back as the `NextToken` query parameter on the next call;
 * a null or missing token ends the sequence.
 *
 * A Paginator is lazy (nothing is sent until the first advance) and single-pass:
 * once it has seen a null token it never sends another request, and iterating
 * it again yields nothing further. Build a new Paginator to start over.
 */

import { isQueryMap, parseQueryString } from './query.js';
import { get } from './request.js';
import type { Session } from './session.js';
import type { TransportOptions } from './transport.js';
import type { Query, QueryMapping, QueryValue } from './types.js';

export const NEXT_TOKEN_PARAM = 'NextToken';

// The cursor field is fixed; the items field varies by endpoint
export interface PageBody<T> {
  nextToken?: string | null;
  [field: string]: T[] | string | null | undefined;
}

export interface PaginatorOptions {
  query?: Query;
  // Response field that holds the page's items (default `items`)
  itemsKey?: string;
  session?: Session;
  transport?: TransportOptions;
  version?: string;
}

type PaginatorState = 'active' | 'exhausted';

function withCursor(query: Query | undefined, token: string): QueryMapping {
  if (query === undefined) {
    return { [NEXT_TOKEN_PARAM]: token };
  }
  if (typeof query === 'string') {
    return parseQueryString(query).set(NEXT_TOKEN_PARAM, token);
  }
  if (isQueryMap(query)) {
    return new Map<string, QueryValue>(query).set(NEXT_TOKEN_PARAM, token);
  }
  return { ...query, [NEXT_TOKEN_PARAM]: token };
}

export class Paginator<T> implements AsyncIterableIterator<T> {
  private state: PaginatorState = 'active';
  private query: Query | undefined;
  private items: T[] = [];
  private index = 0;
  private token: string | null = null;
  private pending: Promise<void> | null = null;

  private readonly path: string;
  private readonly itemsKey: string;
  private readonly session?: Session;
  private readonly transport?: TransportOptions;
  private readonly version?: string;

  constructor(path: string, options: PaginatorOptions = {}) {
    this.path = path;
    this.query = options.query;
    this.itemsKey = options.itemsKey ?? 'items';
    this.session = options.session;
    this.transport = options.transport;
    this.version = options.version;
  }

  /** True once the last page has been fetched and every item handed out. */
  get exhausted(): boolean {
    return this.state === 'exhausted' && this.index >= this.items.length;
  }

  /** The cursor that the next request will carry, or null before the first page and after the last. */
  get nextToken(): string | null {
    return this.token;
  }

  async hasNext(): Promise<boolean> {
    while (this.index >= this.items.length && this.state === 'active') {
      this.pending ??= this.fetchPage().finally(() => {
        this.pending = null;
      });
      await this.pending;
    }
    return this.index < this.items.length;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (await this.hasNext()) {
      return { done: false, value: this.items[this.index++] };
    }
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Drains the remaining items into an array. */
  async toArray(): Promise<T[]> {
    const collected: T[] = [];
    for await (const item of this) {
      collected.push(item);
    }
    return collected;
  }

  private async fetchPage(): Promise<void> {
    const page = await get<PageBody<T> | null>(this.path, {
      query: this.query,
      session: this.session,
      transport: this.transport,
      version: this.version,
    });

    const items = page?.[this.itemsKey];
    this.items = Array.isArray(items) ? items : [];
    this.index = 0;

    const token = page?.nextToken ?? null;
    this.token = token;
    if (token === null) {
      this.state = 'exhausted';
    } else {
      this.query = withCursor(this.query, token);
    }
  }
}
