import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { decodeHeader, encodeHeader, FilePayloadStore, HEADER_BYTES } from '../cache/payloadStore.js';
import type { EntryMeta } from '../cache/payloadStore.js';
import { ResultCache } from '../cache/resultCache.js';
import type { RetrievalRequest } from '../retrieval/request.js';

const KEY = 'a'.repeat(64);

function meta(overrides: Partial<EntryMeta> = {}): EntryMeta {
  return { key: KEY, createdAt: 1000, lastAccessedAt: 1000, byteSize: 7, ...overrides };
}

describe('cache entry header', () => {
  it('is a fixed-width line', () => {
    const header = encodeHeader(meta({ windowEnd: 5000 }));

    expect(header).toHaveLength(HEADER_BYTES);
    expect(header.endsWith('\n')).toBe(true);
    expect(decodeHeader(header)).toEqual(meta({ windowEnd: 5000 }));
  });

  it('rejects headers it cannot read', () => {
    expect(decodeHeader('not json')).toBeUndefined();
    expect(decodeHeader(JSON.stringify({ v: 2, ...meta() }))).toBeUndefined();
    expect(decodeHeader(JSON.stringify({ v: 1, ...meta({ key: 'short' }) }))).toBeUndefined();
  });

  it('refuses metadata that does not fit', () => {
    expect(() => encodeHeader(meta({ key: 'k'.repeat(300) }))).toThrow(`exceeds ${HEADER_BYTES} bytes`);
  });
});

describe('FilePayloadStore', () => {
  let directory: string;
  let store: FilePayloadStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'logscope-cache-'));
    store = new FilePayloadStore(directory);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes one file per entry with the header before the payload', async () => {
    await store.write(meta(), 'payload');

    expect(await readdir(directory)).toEqual([`${KEY}.entry`]);
    const contents = await readFile(join(directory, `${KEY}.entry`), 'utf8');
    expect(contents.length).toBe(HEADER_BYTES + 7);
    expect(contents.slice(HEADER_BYTES)).toBe('payload');
    expect(await store.read(KEY)).toBe('payload');
  });

  it('returns undefined for entries that do not exist', async () => {
    expect(await store.read(KEY)).toBeUndefined();
    await expect(store.touch(meta())).resolves.toBeUndefined();
  });

  it('rewrites the header in place on touch', async () => {
    await store.write(meta(), 'payload');
    await store.touch(meta({ lastAccessedAt: 9000 }));

    expect(await store.loadIndex()).toEqual([meta({ lastAccessedAt: 9000 })]);
    expect(await store.read(KEY)).toBe('payload');
  });

  it('discards unreadable entry files while loading the index', async () => {
    await store.write(meta(), 'payload');
    await writeFile(join(directory, 'broken.entry'), 'nope');
    await writeFile(join(directory, 'notes.txt'), 'kept');

    expect(await store.loadIndex()).toEqual([meta()]);
    expect((await readdir(directory)).sort()).toEqual([`${KEY}.entry`, 'notes.txt']);
  });

  it('removes and clears entries', async () => {
    await store.write(meta(), 'payload');
    await store.write(meta({ key: 'b'.repeat(64) }), 'payload');

    await store.remove(KEY);
    expect(await store.read(KEY)).toBeUndefined();

    await store.clear();
    expect(await readdir(directory)).toEqual([]);
  });

  it('lets a new cache pick up entries written by an earlier one', async () => {
    const request: RetrievalRequest = {
      kind: 'enumerate',
      scope: { type: 'prefix', prefix: '/app' },
      limit: 10
    };
    const first = new ResultCache({ capacityBytes: 4096, ttlMs: 60_000, store });
    await first.store(request, '{"items":[],"truncated":false}');

    const second = new ResultCache({ capacityBytes: 4096, ttlMs: 60_000, store: new FilePayloadStore(directory) });

    expect(await second.lookup(request)).toBe('{"items":[],"truncated":false}');
    expect(second.stats().entryCount).toBe(1);
  });
});
