import type { Logger } from 'pino';
import type { CacheStats } from '../../../shared/types.js';
import { requestSignature } from '../retrieval/request.js';
import type { RetrievalRequest } from '../retrieval/request.js';
import { createComponentLogger } from '../utils/logger.js';
import { MemoryPayloadStore } from './payloadStore.js';
import type { EntryMeta, PayloadStore } from './payloadStore.js';

export interface ResultCacheOptions {
  capacityBytes: number;
  ttlMs: number;
  /** Entries created more recently than this are never chosen for size eviction. */
  recencyFloorMs?: number;
  /** Requests whose window ended longer ago than this are exempt from TTL expiry. */
  historicalAgeMs?: number;
  store?: PayloadStore;
  now?: () => number;
  logger?: Logger;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Content-addressed cache of raw retrieval payloads keyed by request
 * signature, bounded by total bytes and entry age. Operations on the same
 * key run one at a time.
 */
export class ResultCache {
  private readonly capacityBytes: number;
  private readonly ttlMs: number;
  private readonly recencyFloorMs: number;
  private readonly historicalAgeMs: number;
  private readonly payloads: PayloadStore;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly index = new Map<string, EntryMeta>();
  private readonly locks = new Map<string, Promise<unknown>>();
  private readonly loading: Promise<void>;
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResultCacheOptions) {
    this.capacityBytes = options.capacityBytes;
    this.ttlMs = options.ttlMs;
    this.recencyFloorMs = options.recencyFloorMs ?? 1000;
    this.historicalAgeMs = options.historicalAgeMs ?? DAY_MS;
    this.payloads = options.store ?? new MemoryPayloadStore();
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createComponentLogger('cache');
    this.loading = this.loadIndex();
    this.loading.catch((error: unknown) => {
      this.logger.error({ err: error }, 'failed to load cache index');
    });
  }

  private async loadIndex(): Promise<void> {
    const entries = await this.payloads.loadIndex();
    for (const meta of entries) {
      this.index.set(meta.key, meta);
      this.totalBytes += meta.byteSize;
    }
    if (entries.length) {
      this.logger.info({ entries: entries.length, totalBytes: this.totalBytes }, 'cache index loaded');
    }
  }

  /** Resolves once the persisted index has been scanned. */
  ready(): Promise<void> {
    return this.loading;
  }

  private async withKeyLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    this.locks.set(key, run);
    try {
      return await run;
    } finally {
      if (this.locks.get(key) === run) {
        this.locks.delete(key);
      }
    }
  }

  private isExpired(meta: EntryMeta, now: number): boolean {
    if (meta.windowEnd !== undefined && meta.windowEnd < now - this.historicalAgeMs) {
      return false;
    }
    return now - meta.createdAt > this.ttlMs;
  }

  private dropFromIndex(meta: EntryMeta): boolean {
    if (this.index.get(meta.key) !== meta) {
      return false;
    }
    this.index.delete(meta.key);
    this.totalBytes -= meta.byteSize;
    this.evictions += 1;
    return true;
  }

  async lookup(request: RetrievalRequest): Promise<string | undefined> {
    await this.loading;
    const key = requestSignature(request);

    return this.withKeyLock(key, async () => {
      const meta = this.index.get(key);
      if (!meta) {
        this.misses += 1;
        return undefined;
      }

      const now = this.now();
      if (this.isExpired(meta, now)) {
        this.dropFromIndex(meta);
        this.misses += 1;
        await this.payloads.remove(key);
        this.logger.debug({ key }, 'cache entry expired');
        return undefined;
      }

      const payload = await this.readPayload(meta);
      if (payload === undefined) {
        this.misses += 1;
        return undefined;
      }

      await this.touch(meta, now);
      this.hits += 1;
      return payload;
    });
  }

  /**
   * Reads a live entry without recording the access: counters, recency and
   * the persisted header stay as they were. Pair with `recordAccess` once
   * the read is known to count.
   */
  async peek(request: RetrievalRequest): Promise<string | undefined> {
    await this.loading;
    const key = requestSignature(request);

    return this.withKeyLock(key, async () => {
      const meta = this.index.get(key);
      if (!meta || this.isExpired(meta, this.now())) {
        return undefined;
      }
      return this.readPayload(meta);
    });
  }

  /** Applies the bookkeeping of a deferred `peek`: a hit refreshes recency, a miss is counted. */
  async recordAccess(request: RetrievalRequest, hit: boolean): Promise<void> {
    await this.loading;
    const key = requestSignature(request);

    await this.withKeyLock(key, async () => {
      const meta = this.index.get(key);
      if (!hit || !meta) {
        this.misses += 1;
        return;
      }
      await this.touch(meta, this.now());
      this.hits += 1;
    });
  }

  private async readPayload(meta: EntryMeta): Promise<string | undefined> {
    const payload = await this.payloads.read(meta.key);
    if (payload === undefined && this.dropFromIndex(meta)) {
      this.logger.warn({ key: meta.key }, 'cache payload missing; entry dropped');
    }
    return payload;
  }

  private async touch(meta: EntryMeta, now: number): Promise<void> {
    if (this.index.get(meta.key) !== meta) {
      return;
    }
    const touched: EntryMeta = { ...meta, lastAccessedAt: now };
    this.index.set(meta.key, touched);
    await this.payloads.touch(touched);
  }

  /**
   * Stores `payload` for `request`, replacing any equivalent entry, then
   * evicts least-recently-used entries until the cache is back under
   * capacity. Returns false when the payload alone exceeds capacity.
   */
  async store(request: RetrievalRequest, payload: string): Promise<boolean> {
    await this.loading;
    const key = requestSignature(request);
    const byteSize = Buffer.byteLength(payload, 'utf8');

    if (byteSize > this.capacityBytes) {
      this.logger.debug({ key, byteSize, capacityBytes: this.capacityBytes }, 'payload larger than cache; not stored');
      return false;
    }

    return this.withKeyLock(key, async () => {
      const now = this.now();
      const meta: EntryMeta = { key, createdAt: now, lastAccessedAt: now, byteSize };
      if (request.window) {
        meta.windowEnd = request.window.end;
      }

      await this.payloads.write(meta, payload);

      const previous = this.index.get(key);
      if (previous) {
        this.totalBytes -= previous.byteSize;
      }
      this.index.set(key, meta);
      this.totalBytes += byteSize;

      await this.enforceCapacity(key, now);
      return true;
    });
  }

  private async enforceCapacity(justStored: string, now: number): Promise<void> {
    if (this.totalBytes <= this.capacityBytes) {
      return;
    }

    const candidates = Array.from(this.index.values())
      .filter((meta) => meta.key !== justStored && now - meta.createdAt >= this.recencyFloorMs)
      .sort((a, b) => a.lastAccessedAt - b.lastAccessedAt || a.createdAt - b.createdAt);

    const victims: string[] = [];
    for (const meta of candidates) {
      if (this.totalBytes <= this.capacityBytes) {
        break;
      }
      if (this.dropFromIndex(meta)) {
        victims.push(meta.key);
      }
    }

    await Promise.all(victims.map((key) => this.payloads.remove(key)));

    if (victims.length) {
      this.logger.debug({ evicted: victims.length, totalBytes: this.totalBytes }, 'cache entries evicted for size');
    }
    if (this.totalBytes > this.capacityBytes) {
      this.logger.warn(
        { totalBytes: this.totalBytes, capacityBytes: this.capacityBytes },
        'cache over capacity; remaining entries are inside the recency floor'
      );
    }
  }

  /** Removes every entry past its TTL. Returns how many were removed. */
  async evictExpired(): Promise<number> {
    await this.loading;
    const now = this.now();
    const expired = Array.from(this.index.values()).filter((meta) => this.isExpired(meta, now));
    const removed = expired.filter((meta) => this.dropFromIndex(meta));
    await Promise.all(removed.map((meta) => this.payloads.remove(meta.key)));
    return removed.length;
  }

  async clear(): Promise<void> {
    await this.loading;
    this.index.clear();
    this.totalBytes = 0;
    await this.payloads.clear();
  }

  stats(): CacheStats {
    return {
      entryCount: this.index.size,
      totalBytes: this.totalBytes,
      capacityBytes: this.capacityBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions
    };
  }
}
