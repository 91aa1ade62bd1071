import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { LogEvent } from '../../../shared/types.js';
import { InvalidParametersError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';

export interface ArchivedResult {
  id: string;
  tool: string;
  input: Readonly<Record<string, unknown>>;
  items: readonly LogEvent[];
  createdAt: number;
}

export type LevelName = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG' | 'OTHER';

export interface ArchiveSummary {
  resultId: string;
  totalEvents: number;
  timeRange?: { start: number; end: number };
  levels: Partial<Record<LevelName, number>>;
  samples: LogEvent[];
}

/** Window over an archived result. `start` and `end` bound event timestamps inclusively. */
export interface SliceQuery {
  offset: number;
  limit: number;
  filter?: string;
  start?: number;
  end?: number;
}

export interface ArchiveSlice {
  resultId: string;
  items: LogEvent[];
  offset: number;
  totalMatching: number;
  totalEvents: number;
  hasMore: boolean;
}

export interface ResultArchiveOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
  logger?: Logger;
}

export const SAMPLE_EVENTS = 5;

/** Same tool and input, same id: re-running a query replaces its archive entry. */
export function archiveId(tool: string, input: Readonly<Record<string, unknown>>): string {
  const digest = createHash('sha256').update(`${tool}:${JSON.stringify(input)}`).digest('hex');
  return `result_${digest.slice(0, 16)}`;
}

function levelOf(message: string): LevelName {
  const upper = message.toUpperCase();
  if (upper.includes('ERROR') || upper.includes('EXCEPTION')) return 'ERROR';
  if (upper.includes('WARN')) return 'WARN';
  if (upper.includes('INFO')) return 'INFO';
  if (upper.includes('DEBUG')) return 'DEBUG';
  return 'OTHER';
}

/** First, last and evenly spaced events in between. */
export function sampleEvents(items: readonly LogEvent[], count = SAMPLE_EVENTS): LogEvent[] {
  if (items.length <= count) {
    return [...items];
  }
  const step = Math.floor(items.length / (count - 1));
  const indices = new Set<number>([0]);
  for (let i = 1; i < count - 1; i += 1) {
    indices.add(Math.min(i * step, items.length - 1));
  }
  indices.add(items.length - 1);
  return Array.from(indices, (index) => items[index]);
}

export function summarizeArchive(entry: ArchivedResult): ArchiveSummary {
  const levels: Partial<Record<LevelName, number>> = {};
  let start = Infinity;
  let end = -Infinity;
  for (const event of entry.items) {
    const level = levelOf(event.message);
    levels[level] = (levels[level] ?? 0) + 1;
    start = Math.min(start, event.timestamp);
    end = Math.max(end, event.timestamp);
  }
  return {
    resultId: entry.id,
    totalEvents: entry.items.length,
    ...(entry.items.length ? { timeRange: { start, end } } : {}),
    levels,
    samples: sampleEvents(entry.items)
  };
}

/**
 * Holds redacted event lists that were too large for the model context so
 * the model can page through them with fetch_cached_result. Entries expire
 * after `ttlMs`; past `maxEntries` the oldest entry goes first.
 */
export class ResultArchive {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly entries = new Map<string, ArchivedResult>();

  constructor(options: ResultArchiveOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createComponentLogger('result-archive');
  }

  /** Builds an entry without storing it, so a step can hold it until it completes. */
  prepare(tool: string, input: Readonly<Record<string, unknown>>, items: readonly LogEvent[]): ArchivedResult {
    return { id: archiveId(tool, input), tool, input, items, createdAt: this.now() };
  }

  put(entry: ArchivedResult): void {
    this.evictExpired();
    this.entries.delete(entry.id);
    this.entries.set(entry.id, entry);
    for (const id of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) {
        break;
      }
      this.entries.delete(id);
    }
    this.logger.debug({ resultId: entry.id, tool: entry.tool, events: entry.items.length }, 'result archived');
  }

  slice(resultId: string, query: SliceQuery): ArchiveSlice {
    const entry = this.entries.get(resultId);
    if (!entry || this.isExpired(entry)) {
      throw new InvalidParametersError(
        `No archived result '${resultId}'. It may have expired; run the original query again.`
      );
    }

    const needle = query.filter?.toLowerCase();
    const matching = entry.items.filter(
      (event) =>
        (query.start === undefined || event.timestamp >= query.start) &&
        (query.end === undefined || event.timestamp <= query.end) &&
        (!needle || event.message.toLowerCase().includes(needle))
    );
    const items = matching.slice(query.offset, query.offset + query.limit);
    return {
      resultId,
      items,
      offset: query.offset,
      totalMatching: matching.length,
      totalEvents: entry.items.length,
      hasMore: query.offset + items.length < matching.length
    };
  }

  evictExpired(): number {
    let removed = 0;
    for (const entry of this.entries.values()) {
      if (this.isExpired(entry)) {
        this.entries.delete(entry.id);
        removed += 1;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: ArchivedResult): boolean {
    return this.now() - entry.createdAt > this.ttlMs;
  }
}
