import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryPayloadStore } from '../cache/payloadStore.js';
import { ResultArchive } from '../cache/resultArchive.js';
import { ResultCache } from '../cache/resultCache.js';
import { StagedWrites } from '../cache/stagedWrites.js';
import { ToolAdapter } from '../tools/index.js';
import { createRedactor } from '../utils/sanitize-text.js';
import {
  CancelledError,
  InvalidParametersError,
  RateLimitedError,
  RemoteUnavailableError,
  ScopeNotFoundError
} from '../utils/errors.js';
import { FakeLogStore } from './fakes.js';

const END = Date.UTC(2024, 0, 15, 12, 0, 0);
const HOUR = 60 * 60 * 1000;
const window = { start: END - HOUR, end: END };

function at(minutesBeforeEnd: number): number {
  return END - minutesBeforeEnd * 60 * 1000;
}

describe('ToolAdapter', () => {
  let remote: FakeLogStore;
  let cache: ResultCache;
  let adapter: ToolAdapter;

  beforeEach(() => {
    remote = new FakeLogStore();
    cache = new ResultCache({ capacityBytes: 1024 * 1024, ttlMs: HOUR });
    adapter = new ToolAdapter({
      remote,
      cache,
      redactor: createRedactor(),
      itemCap: 100,
      retry: { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 }
    });
  });

  describe('fetchEvents', () => {
    it('serves a repeated request from the cache', async () => {
      remote.addEvents('/app/api', [{ timestamp: at(10), message: 'GET /orders 500' }]);

      const first = await adapter.fetchEvents({ group: '/app/api', window });
      const second = await adapter.fetchEvents({ group: '/app/api', window });

      expect(first.cached).toBe(false);
      expect(second.cached).toBe(true);
      expect(second.items).toEqual(first.items);
      expect(remote.callsFor('fetch')).toHaveLength(1);
      expect(cache.stats()).toMatchObject({ entryCount: 1, hits: 1, misses: 1 });
    });

    it('caches the raw payload and returns a redacted copy', async () => {
      remote.addEvents('/app/auth', [{ timestamp: at(5), message: 'login failed for alice@example.com' }]);

      const result = await adapter.fetchEvents({ group: '/app/auth', window });

      expect(result.items[0].message).toBe('login failed for [REDACTED_EMAIL]');
      expect(result.redactions).toBe(1);
      const stored = await cache.lookup({ kind: 'fetch', scope: { type: 'group', group: '/app/auth' }, window, limit: 100 });
      expect(stored).toContain('login failed for alice@example.com');
    });

    it('asks for one item more than the limit to detect truncation', async () => {
      remote.addEvents(
        '/app/api',
        [1, 2, 3, 4, 5].map((minute) => ({ timestamp: at(minute), message: `event ${minute}` }))
      );

      const result = await adapter.fetchEvents({ group: '/app/api', window, limit: 3 });

      expect(remote.callsFor('fetch')[0].limit).toBe(4);
      expect(result.truncated).toBe(true);
      expect(result.items.map((event) => event.message)).toEqual(['event 5', 'event 4', 'event 3']);
    });

    it('passes the filter pattern through', async () => {
      remote.addEvents('/app/api', [
        { timestamp: at(3), message: 'ERROR timeout' },
        { timestamp: at(2), message: 'INFO ok' }
      ]);

      const result = await adapter.fetchEvents({ group: '/app/api', window, filter: ' ERROR ' });

      expect(remote.callsFor('fetch')[0].filter).toBe('ERROR');
      expect(result.items.map((event) => event.message)).toEqual(['ERROR timeout']);
    });

    it('retries rate-limited calls', async () => {
      remote.addEvents('/app/api', [{ timestamp: at(1), message: 'ok' }]);
      remote.failNext('/app/api', new RateLimitedError('slow down'));

      const result = await adapter.fetchEvents({ group: '/app/api', window });

      expect(result.items).toHaveLength(1);
      expect(remote.callsFor('fetch')).toHaveLength(2);
    });

    it('does not retry other remote failures', async () => {
      remote.failNext('/app/api', new RemoteUnavailableError('connection refused'));

      await expect(adapter.fetchEvents({ group: '/app/api', window })).rejects.toThrow('connection refused');
      expect(remote.callsFor('fetch')).toHaveLength(1);
      expect(cache.stats().entryCount).toBe(0);
    });

    it('fails fast once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(adapter.fetchEvents({ group: '/app/api', window }, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError
      );
      expect(remote.calls).toHaveLength(0);
    });

    it('stages cache writes when given a staging area', async () => {
      remote.addEvents('/app/api', [{ timestamp: at(1), message: 'ok' }]);
      const staging = new StagedWrites();

      await adapter.fetchEvents({ group: '/app/api', window }, { staging });
      expect(staging.size).toBe(1);
      expect(cache.stats().entryCount).toBe(0);

      const again = await adapter.fetchEvents({ group: '/app/api', window }, { staging });
      expect(again.cached).toBe(true);
      expect(remote.callsFor('fetch')).toHaveLength(1);

      await staging.commit(cache);
      expect(cache.stats().entryCount).toBe(1);
    });

    it('reports a timed-out remote call as unavailable', async () => {
      const impatient = new ToolAdapter({
        remote,
        cache,
        redactor: createRedactor(),
        itemCap: 100,
        retry: { maxRetries: 0, timeoutMs: 20 }
      });
      remote.hanging.add('/slow');

      const failure = await impatient.fetchEvents({ group: '/slow', window }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(RemoteUnavailableError);
      expect(failure).toMatchObject({ code: 'remote_unavailable', message: 'logstore.fetch timed out after 20ms' });
      expect(cache.stats().entryCount).toBe(0);
    });

    it('defers cache hit bookkeeping to the staging commit', async () => {
      const store = new MemoryPayloadStore();
      let clock = END;
      const clocked = new ResultCache({ capacityBytes: 1024 * 1024, ttlMs: HOUR, store, now: () => clock });
      const staged = new ToolAdapter({ remote, cache: clocked, redactor: createRedactor(), itemCap: 100 });
      remote.addEvents('/app/api', [{ timestamp: at(1), message: 'ok' }]);
      await staged.fetchEvents({ group: '/app/api', window });
      clock = END + 60 * 1000;
      const staging = new StagedWrites();

      const result = await staged.fetchEvents({ group: '/app/api', window }, { staging });

      expect(result.cached).toBe(true);
      expect(clocked.stats()).toMatchObject({ hits: 0, misses: 1 });
      expect((await store.loadIndex())[0].lastAccessedAt).toBe(END);

      await staging.commit(clocked);

      expect(clocked.stats()).toMatchObject({ hits: 1, misses: 1 });
      expect((await store.loadIndex())[0].lastAccessedAt).toBe(END + 60 * 1000);
    });

    it('returns messages untouched when redaction is disabled', async () => {
      const plain = new ToolAdapter({ remote, cache, redactor: createRedactor({ enabled: false }), itemCap: 100 });
      remote.addEvents('/app/auth', [{ timestamp: at(5), message: 'login failed for alice@example.com' }]);

      const result = await plain.fetchEvents({ group: '/app/auth', window });

      expect(result.items[0].message).toBe('login failed for alice@example.com');
      expect(result.redactions).toBe(0);
    });
  });

  describe('searchEvents', () => {
    it('merges branches in timestamp order', async () => {
      remote.addEvents('/a', [{ timestamp: at(30), message: 'a1' }, { timestamp: at(10), message: 'a2' }]);
      remote.addEvents('/b', [{ timestamp: at(20), message: 'b1' }]);

      const result = await adapter.searchEvents({ groups: ['/b', '/a'], window });

      expect(result.items.map((event) => event.message)).toEqual(['a1', 'b1', 'a2']);
      expect(result.failures).toBeUndefined();
      expect(remote.callsFor('search').map((call) => call.scope)).toEqual(['/a', '/b']);
    });

    it('reports failed branches as partial failures', async () => {
      remote.addEvents('/a', [{ timestamp: at(30), message: 'a1' }]);
      remote.failNext('/b', new ScopeNotFoundError('/b'));

      const result = await adapter.searchEvents({ groups: ['/a', '/b'], window });

      expect(result.items.map((event) => event.message)).toEqual(['a1']);
      expect(result.failures).toEqual([{ scope: '/b', code: 'scope_not_found', message: 'Log group not found: /b' }]);
    });

    it('fails when every branch fails', async () => {
      remote.failNext('/a', new ScopeNotFoundError('/a'));
      remote.failNext('/b', new RemoteUnavailableError('down'));

      await expect(adapter.searchEvents({ groups: ['/a', '/b'], window })).rejects.toBeInstanceOf(ScopeNotFoundError);
    });

    it('keeps the most recent events when the merge exceeds the limit', async () => {
      remote.addEvents('/a', [{ timestamp: at(30), message: 'a1' }, { timestamp: at(10), message: 'a2' }]);
      remote.addEvents('/b', [{ timestamp: at(20), message: 'b1' }]);

      const result = await adapter.searchEvents({ groups: ['/a', '/b'], window, limit: 2 });

      expect(result.items.map((event) => event.message)).toEqual(['b1', 'a2']);
      expect(result.truncated).toBe(true);
    });

    it('caches each branch separately', async () => {
      remote.addEvents('/a', [{ timestamp: at(30), message: 'a1' }]);
      remote.addEvents('/b', [{ timestamp: at(20), message: 'b1' }]);

      await adapter.searchEvents({ groups: ['/a'], window });
      const result = await adapter.searchEvents({ groups: ['/a', '/b'], window });

      expect(result.cached).toBe(false);
      expect(remote.callsFor('search').map((call) => call.scope)).toEqual(['/a', '/b']);
      expect(cache.stats().entryCount).toBe(2);
    });
  });

  describe('enumerateGroups', () => {
    it('folds the prefix before asking the remote', async () => {
      remote.groups = [{ name: '/app/api' }, { name: '/app/auth' }, { name: '/infra/db' }];

      const result = await adapter.enumerateGroups({ prefix: ' /APP' });

      expect(remote.calls[0]).toMatchObject({ operation: 'enumerate', scope: '/app', limit: 101 });
      expect(result.items.map((group) => group.name)).toEqual(['/app/api', '/app/auth']);
      expect(result.truncated).toBe(false);
    });

    it('lists every group when the prefix is empty', async () => {
      remote.groups = [{ name: '/a' }, { name: '/b' }];

      const result = await adapter.run({ tool: 'list_log_groups', params: {} });

      expect(result.kind).toBe('groups');
      expect(result.items).toHaveLength(2);
      expect(remote.calls[0].scope).toBe('');
    });
  });

  describe('fetch_cached_result', () => {
    it('pages through an archived result without calling the remote', async () => {
      const archive = new ResultArchive({ ttlMs: HOUR, maxEntries: 10 });
      const entry = archive.prepare(
        'fetch_logs',
        { log_group: '/app/api' },
        [1, 2, 3, 4].map((n) => ({ timestamp: at(10 - n), message: `ERROR ${n}`, group: '/app/api' }))
      );
      archive.put(entry);
      const paging = new ToolAdapter({ remote, cache, redactor: createRedactor(), itemCap: 100, archive });

      const result = await paging.run({
        tool: 'fetch_cached_result',
        params: { resultId: entry.id, offset: 1, limit: 2 }
      });

      expect(result.kind).toBe('events');
      expect(result.items.map((event) => event.message)).toEqual(['ERROR 2', 'ERROR 3']);
      expect(result).toMatchObject({
        truncated: true,
        cached: true,
        page: { resultId: entry.id, offset: 1, totalMatching: 4, totalEvents: 4, hasMore: true }
      });
      expect(remote.calls).toHaveLength(0);
    });

    it('rejects reads when nothing is archived', async () => {
      await expect(
        adapter.run({ tool: 'fetch_cached_result', params: { resultId: 'result_abc', offset: 0, limit: 10 } })
      ).rejects.toThrow(InvalidParametersError);
    });
  });
});
