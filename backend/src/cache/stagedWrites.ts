import { requestSignature } from '../retrieval/request.js';
import type { RetrievalRequest } from '../retrieval/request.js';
import type { ResultCache } from './resultCache.js';

/**
 * Cache writes and access bookkeeping held back until the orchestrator step
 * that produced them completes. A cancelled step discards them, leaving
 * the cache untouched.
 */
export class StagedWrites {
  private readonly pending = new Map<string, { request: RetrievalRequest; payload: string }>();
  private readonly accesses: Array<{ request: RetrievalRequest; hit: boolean }> = [];

  stage(request: RetrievalRequest, payload: string): void {
    this.pending.set(requestSignature(request), { request, payload });
  }

  peek(request: RetrievalRequest): string | undefined {
    return this.pending.get(requestSignature(request))?.payload;
  }

  /** Holds the hit or miss of a `ResultCache.peek` until commit. */
  recordAccess(request: RetrievalRequest, hit: boolean): void {
    this.accesses.push({ request, hit });
  }

  get size(): number {
    return this.pending.size;
  }

  async commit(cache: ResultCache): Promise<void> {
    const writes = Array.from(this.pending.values());
    const accesses = this.accesses.splice(0);
    this.pending.clear();
    await Promise.all(accesses.map(({ request, hit }) => cache.recordAccess(request, hit)));
    await Promise.all(writes.map(({ request, payload }) => cache.store(request, payload)));
  }

  discard(): void {
    this.pending.clear();
    this.accesses.length = 0;
  }
}
