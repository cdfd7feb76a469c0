import { afterEach, describe, expect, it } from 'vitest';
import { Paginator } from '../src/client/paginate.js';
import { Session, clearDefaultSession, createSession } from '../src/client/session.js';
import { ApiError } from '../src/client/types.js';
import { API_ROOT, createFakeTransport, jsonResponse, type FakeTransport } from './test-utils.js';

interface Item {
  id: string;
}

function threePages(): FakeTransport {
  return createFakeTransport(
    jsonResponse({ items: [{ id: 'A' }, { id: 'B' }], nextToken: 't1' }),
    jsonResponse({ items: [{ id: 'C' }], nextToken: 't2' }),
    jsonResponse({ items: [{ id: 'D' }], nextToken: null }),
  );
}

function ids(items: Item[]): string[] {
  return items.map((item) => item.id);
}

afterEach(() => {
  clearDefaultSession();
});

describe('Paginator', () => {
  it('follows the cursor across pages in server order', async () => {
    const transport = threePages();
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    expect(ids(await pages.toArray())).toEqual(['A', 'B', 'C', 'D']);
    expect(transport.requests().map((sent) => sent.url)).toEqual([
      `${API_ROOT}/things`,
      `${API_ROOT}/things?NextToken=t1`,
      `${API_ROOT}/things?NextToken=t2`,
    ]);
  });

  it('sends nothing until first advanced', async () => {
    const transport = threePages();
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    expect(transport.send).not.toHaveBeenCalled();
    await pages.next();
    expect(transport.send).toHaveBeenCalledTimes(1);
  });

  it('hands out a page item by item before fetching the next', async () => {
    const transport = threePages();
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    await expect(pages.next()).resolves.toEqual({ done: false, value: { id: 'A' } });
    await expect(pages.next()).resolves.toEqual({ done: false, value: { id: 'B' } });
    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(pages.nextToken).toBe('t1');

    await expect(pages.next()).resolves.toEqual({ done: false, value: { id: 'C' } });
    expect(transport.send).toHaveBeenCalledTimes(2);
  });

  it('is single-pass and silent after the last page', async () => {
    const transport = threePages();
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    expect(pages.exhausted).toBe(false);
    await pages.toArray();
    expect(pages.exhausted).toBe(true);
    expect(pages.nextToken).toBeNull();

    await expect(pages.next()).resolves.toEqual({ done: true, value: undefined });
    await expect(pages.hasNext()).resolves.toBe(false);
    expect(await pages.toArray()).toEqual([]);
    expect(transport.send).toHaveBeenCalledTimes(3);
  });

  it('works with for await', async () => {
    const transport = threePages();
    const seen: string[] = [];

    for await (const item of new Paginator<Item>('/things', { session: new Session('test-key', { transport }) })) {
      seen.push(item.id);
    }

    expect(seen).toEqual(['A', 'B', 'C', 'D']);
  });

  it('merges the cursor into a mapping query without touching the original', async () => {
    const transport = threePages();
    const query = { Status: 'Live', Size: 2 };
    const pages = new Paginator<Item>('/things', { query, session: new Session('test-key', { transport }) });

    await pages.toArray();

    expect(transport.requests().map((sent) => sent.url)).toEqual([
      `${API_ROOT}/things?Status=Live&Size=2`,
      `${API_ROOT}/things?Status=Live&Size=2&NextToken=t1`,
      `${API_ROOT}/things?Status=Live&Size=2&NextToken=t2`,
    ]);
    expect(query).toEqual({ Status: 'Live', Size: 2 });
  });

  it('parses a string query once the cursor has to be added', async () => {
    const transport = threePages();
    const pages = new Paginator<Item>('/things', {
      query: 'Status=Live&Size=2',
      session: new Session('test-key', { transport }),
    });

    await pages.toArray();

    expect(transport.requests().map((sent) => sent.url)).toEqual([
      `${API_ROOT}/things?Status=Live&Size=2`,
      `${API_ROOT}/things?Status=Live&Size=2&NextToken=t1`,
      `${API_ROOT}/things?Status=Live&Size=2&NextToken=t2`,
    ]);
  });

  it('overwrites a cursor already present in the starting query', async () => {
    const transport = createFakeTransport(
      jsonResponse({ items: [{ id: 'A' }], nextToken: 't1' }),
      jsonResponse({ items: [], nextToken: null }),
    );
    const pages = new Paginator<Item>('/things', {
      query: 'NextToken=resume&Size=5',
      session: new Session('test-key', { transport }),
    });

    await pages.toArray();

    expect(transport.requests()[1].url).toBe(`${API_ROOT}/things?NextToken=t1&Size=5`);
  });

  it('skips pages without items while the cursor continues', async () => {
    const transport = createFakeTransport(
      jsonResponse({ nextToken: 't1' }),
      jsonResponse({ items: [], nextToken: 't2' }),
      jsonResponse({ items: [{ id: 'A' }], nextToken: null }),
    );
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    await expect(pages.hasNext()).resolves.toBe(true);
    expect(transport.send).toHaveBeenCalledTimes(3);
    expect(ids(await pages.toArray())).toEqual(['A']);
  });

  it('treats a missing cursor as the last page', async () => {
    const transport = createFakeTransport(jsonResponse({ items: [{ id: 'A' }] }));
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    expect(ids(await pages.toArray())).toEqual(['A']);
    expect(transport.send).toHaveBeenCalledTimes(1);
  });

  it('reads items from a custom field', async () => {
    const transport = createFakeTransport(
      jsonResponse({ projects: [{ id: 'P1' }, { id: 'P2' }], items: [{ id: 'ignored' }], nextToken: null }),
    );
    const pages = new Paginator<Item>('/project', {
      itemsKey: 'projects',
      session: new Session('test-key', { transport }),
    });

    expect(ids(await pages.toArray())).toEqual(['P1', 'P2']);
  });

  it('uses the default session when none is given', async () => {
    const transport = createFakeTransport(jsonResponse({ items: [{ id: 'A' }], nextToken: null }));
    createSession('default-key', { transport });

    await new Paginator<Item>('/things').toArray();

    expect(transport.requests()[0].headers['X-API-KEY']).toBe('default-key');
  });

  it('surfaces an API error on the advance that hits it', async () => {
    const transport = createFakeTransport(
      jsonResponse({ items: [{ id: 'A' }], nextToken: 't1' }),
      jsonResponse({ error: { title: 'Token expired' } }, 400),
    );
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    await expect(pages.next()).resolves.toEqual({ done: false, value: { id: 'A' } });
    await expect(pages.next()).rejects.toBeInstanceOf(ApiError);
  });

  it('shares one page request between concurrent advances', async () => {
    const transport = createFakeTransport(jsonResponse({ items: [{ id: 'A' }, { id: 'B' }], nextToken: null }));
    const pages = new Paginator<Item>('/things', { session: new Session('test-key', { transport }) });

    const results = await Promise.all([pages.next(), pages.next()]);

    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(results.map((result) => result.value?.id).sort()).toEqual(['A', 'B']);
  });
});
