import { afterEach, describe, expect, it, vi } from 'vitest';
import { HttpLogStore } from '../logstore/httpLogStore.js';
import { RateLimitedError, RemoteUnavailableError, ScopeNotFoundError } from '../utils/errors.js';

const endpoint = 'http://logs.test/';
const window = { start: 1_000, end: 61_000 };

function jsonResponse(body: unknown, init: ResponseInit = {}) {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' }, ...init });
}

describe('HttpLogStore', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts fetch requests with credentials and parses events', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ events: [{ timestamp: 2_000, message: 'ERROR boom', group: '/app/api' }] })
    );
    vi.stubGlobal('fetch', fetchMock);
    const store = new HttpLogStore({ endpoint, apiKey: 'test-secret' });

    const events = await store.fetch('/app/api', window, undefined, { limit: 50 });

    expect(events).toEqual([{ timestamp: 2_000, message: 'ERROR boom', group: '/app/api' }]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://logs.test/groups/%2Fapp%2Fapi/events');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"start":1000,"end":61000,"limit":50}');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
  });

  it('lists groups with the prefix as a query parameter', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ groups: [{ name: '/app/api' }, { name: '/app/web', retentionDays: 7 }] })
    );
    vi.stubGlobal('fetch', fetchMock);
    const store = new HttpLogStore({ endpoint });

    const groups = await store.enumerateGroups('/app', { limit: 10 });

    expect(groups.map((group) => group.name)).toEqual(['/app/api', '/app/web']);
    expect(fetchMock.mock.calls[0][0]).toBe('http://logs.test/groups?limit=10&prefix=%2Fapp');
    expect(fetchMock.mock.calls[0][1]?.headers).not.toHaveProperty('Authorization');
  });

  it('maps 404 to a missing scope', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('no such group', { status: 404 })));
    const store = new HttpLogStore({ endpoint });

    const error = await store.fetch('/gone', window, undefined, { limit: 10 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ScopeNotFoundError);
    expect(error).toMatchObject({ scope: '/gone', message: 'no such group', code: 'scope_not_found' });
  });

  it('maps 429 to a rate limit with the retry-after delay', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 429, headers: { 'retry-after': '2' } })));
    const store = new HttpLogStore({ endpoint });

    const error = await store.search(['/a', '/b'], window, 'ERROR', { limit: 10 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 2000, code: 'rate_limited' });
  });

  it('maps server errors and network failures to an unavailable remote', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('boom', { status: 500, statusText: 'Internal Server Error' }))
    );
    const store = new HttpLogStore({ endpoint });

    await expect(store.fetch('/app/api', window, undefined, { limit: 10 })).rejects.toThrow(
      'fetch failed: 500 Internal Server Error - boom'
    );

    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new TypeError('socket hang up'))));
    await expect(store.search(['/a'], window, undefined, { limit: 10 })).rejects.toThrow(
      new RemoteUnavailableError('search request failed: socket hang up')
    );
  });

  it('rejects responses of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ events: [{ message: 'no timestamp' }] })));
    const store = new HttpLogStore({ endpoint });

    await expect(store.fetch('/app/api', window, undefined, { limit: 10 })).rejects.toThrow(
      /^fetch returned an unexpected response shape/
    );
  });
});
