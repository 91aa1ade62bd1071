import { z } from 'zod';
import type { Logger } from 'pino';
import type { LogEvent, LogGroupSummary, PartialFailure } from '../../../shared/types.js';
import type { ResultArchive } from '../cache/resultArchive.js';
import type { ResultCache } from '../cache/resultCache.js';
import type { StagedWrites } from '../cache/stagedWrites.js';
import type { RemoteLogStore } from '../logstore/logStore.js';
import { canonicalizeRequest } from '../retrieval/request.js';
import type { RetrievalRequest, TimeWindow } from '../retrieval/request.js';
import { abortableCall, throwIfAborted } from '../utils/abort.js';
import { CancelledError, errorMessage, InvalidParametersError, LogscopeError, RateLimitedError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { withRetry } from '../utils/resilience.js';
import type { RetryOptions } from '../utils/resilience.js';
import type { Redactor } from '../utils/sanitize-text.js';
import { effectiveLimit } from './definitions.js';
import type { ArchiveReadParams, EnumerateParams, FetchParams, SearchParams, ToolInvocation } from './definitions.js';

interface ToolResultBase {
  truncated: boolean;
  /** Present on multi-scope searches where some branches failed. */
  failures?: PartialFailure[];
  /** Number of values the redactor replaced in the returned copy. */
  redactions: number;
  cached: boolean;
}

export interface GroupListResult extends ToolResultBase {
  kind: 'groups';
  items: LogGroupSummary[];
}

export interface ArchivePage {
  resultId: string;
  offset: number;
  totalMatching: number;
  totalEvents: number;
  hasMore: boolean;
}

export interface EventListResult extends ToolResultBase {
  kind: 'events';
  items: LogEvent[];
  /** Set when the events are a page of an archived result. */
  page?: ArchivePage;
}

export type ToolResult = GroupListResult | EventListResult;

export interface ToolCallContext {
  signal?: AbortSignal;
  /** When set, cache writes are staged here instead of going straight to the cache. */
  staging?: StagedWrites;
}

export interface ToolAdapterOptions {
  remote: RemoteLogStore;
  cache: ResultCache;
  redactor: Redactor;
  itemCap: number;
  /** Backs fetch_cached_result; without one that tool reports that nothing is archived. */
  archive?: ResultArchive;
  retry?: Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'timeoutMs'>;
  logger?: Logger;
}

const groupItemsSchema: z.ZodType<LogGroupSummary[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    name: z.string(),
    createdAt: z.number().optional(),
    storedBytes: z.number().optional(),
    retentionDays: z.number().optional()
  })
);

const eventItemsSchema: z.ZodType<LogEvent[], z.ZodTypeDef, unknown> = z.array(
  z.object({
    timestamp: z.number(),
    message: z.string(),
    group: z.string(),
    stream: z.string().optional(),
    eventId: z.string().optional()
  })
);

interface RawResult<T> {
  items: T[];
  truncated: boolean;
  cached: boolean;
}

function failureCode(error: unknown): string {
  return error instanceof LogscopeError ? error.code : 'remote_unavailable';
}

/**
 * Uniform entry points over the remote log store. Each call checks the
 * cache first, stores the raw remote result on a miss and hands back a
 * redacted copy.
 */
export class ToolAdapter {
  private readonly remote: RemoteLogStore;
  private readonly cache: ResultCache;
  private readonly redactor: Redactor;
  private readonly itemCap: number;
  private readonly archive?: ResultArchive;
  private readonly retry: ToolAdapterOptions['retry'];
  private readonly logger: Logger;

  constructor(options: ToolAdapterOptions) {
    this.remote = options.remote;
    this.cache = options.cache;
    this.redactor = options.redactor;
    this.itemCap = options.itemCap;
    this.archive = options.archive;
    this.retry = options.retry;
    this.logger = options.logger ?? createComponentLogger('tools');
  }

  run(invocation: ToolInvocation, context: ToolCallContext = {}): Promise<ToolResult> {
    switch (invocation.tool) {
      case 'list_log_groups':
        return this.enumerateGroups(invocation.params, context);
      case 'fetch_logs':
        return this.fetchEvents(invocation.params, context);
      case 'search_logs':
        return this.searchEvents(invocation.params, context);
      case 'fetch_cached_result':
        return this.readArchive(invocation.params, context);
    }
  }

  /** Pages through an archived result. Archived events were redacted before they were stored. */
  async readArchive(params: ArchiveReadParams, context: ToolCallContext = {}): Promise<EventListResult> {
    throwIfAborted(context.signal);
    if (!this.archive) {
      throw new InvalidParametersError(`No archived result '${params.resultId}'. Nothing is archived in this session.`);
    }
    const { resultId, ...query } = params;
    const slice = this.archive.slice(resultId, query);
    return {
      kind: 'events',
      items: slice.items,
      truncated: slice.hasMore,
      cached: true,
      redactions: 0,
      page: {
        resultId,
        offset: slice.offset,
        totalMatching: slice.totalMatching,
        totalEvents: slice.totalEvents,
        hasMore: slice.hasMore
      }
    };
  }

  async enumerateGroups(params: EnumerateParams, context: ToolCallContext = {}): Promise<GroupListResult> {
    const request = canonicalizeRequest({
      kind: 'enumerate',
      scope: { type: 'prefix', prefix: params.prefix ?? '' },
      limit: effectiveLimit(params.limit, this.itemCap)
    });
    const prefix = request.scope.type === 'prefix' && request.scope.prefix ? request.scope.prefix : undefined;

    const raw = await this.retrieve(request, groupItemsSchema, context, (signal, limit) =>
      this.remote.enumerateGroups(prefix, { limit, signal })
    );
    return { kind: 'groups', items: raw.items, truncated: raw.truncated, cached: raw.cached, redactions: 0 };
  }

  async fetchEvents(params: FetchParams, context: ToolCallContext = {}): Promise<EventListResult> {
    const request = canonicalizeRequest({
      kind: 'fetch',
      scope: { type: 'group', group: params.group },
      window: params.window,
      filter: params.filter,
      limit: effectiveLimit(params.limit, this.itemCap)
    });
    if (request.scope.type !== 'group' || !request.scope.group) {
      throw new InvalidParametersError('fetch_logs needs a log group name');
    }
    const group = request.scope.group;
    const window = this.windowOf(request);

    const raw = await this.retrieve(request, eventItemsSchema, context, (signal, limit) =>
      this.remote.fetch(group, window, request.filter, { limit, signal })
    );
    return this.redactEvents(raw);
  }

  /**
   * Fans a multi-group search out into one cached retrieval per group, run
   * concurrently. Failed branches come back as partial-failure markers; the
   * call only fails when every branch does. A merge over the limit keeps the
   * most recent events.
   */
  async searchEvents(params: SearchParams, context: ToolCallContext = {}): Promise<EventListResult> {
    const request = canonicalizeRequest({
      kind: 'search',
      scope: { type: 'groups', groups: params.groups },
      window: params.window,
      filter: params.filter,
      limit: effectiveLimit(params.limit, this.itemCap)
    });
    if (request.scope.type !== 'groups' || request.scope.groups.length === 0) {
      throw new InvalidParametersError('search_logs needs at least one log group');
    }
    const window = this.windowOf(request);
    const groups = request.scope.groups;

    const branches = await Promise.allSettled(
      groups.map((group) =>
        this.retrieve(
          { kind: 'search', scope: { type: 'group', group }, window, filter: request.filter, limit: request.limit },
          eventItemsSchema,
          context,
          (signal, limit) => this.remote.search([group], window, request.filter, { limit, signal })
        )
      )
    );
    throwIfAborted(context.signal);

    const failures: PartialFailure[] = [];
    const items: LogEvent[] = [];
    let truncated = false;
    let cached = true;
    let firstError: unknown;

    for (const [index, branch] of branches.entries()) {
      if (branch.status === 'fulfilled') {
        items.push(...branch.value.items);
        truncated = truncated || branch.value.truncated;
        cached = cached && branch.value.cached;
        continue;
      }
      if (branch.reason instanceof CancelledError) {
        throw branch.reason;
      }
      if (firstError === undefined) {
        firstError = branch.reason;
      }
      failures.push({ scope: groups[index], code: failureCode(branch.reason), message: errorMessage(branch.reason) });
    }

    if (failures.length === groups.length) {
      throw firstError;
    }
    if (failures.length) {
      this.logger.warn({ failed: failures.map((failure) => failure.scope), groups: groups.length }, 'partial search failure');
    }

    // Newest first so truncation drops the oldest events; returned oldest first.
    items.sort((a, b) => b.timestamp - a.timestamp);
    if (items.length > request.limit) {
      truncated = true;
    }
    const kept = items.slice(0, request.limit).reverse();

    const result = this.redactEvents({ items: kept, truncated, cached });
    return failures.length ? { ...result, failures } : result;
  }

  private windowOf(request: RetrievalRequest): TimeWindow {
    if (!request.window) {
      throw new InvalidParametersError(`${request.kind} requires a time window`);
    }
    return request.window;
  }

  private redactEvents(raw: RawResult<LogEvent>): EventListResult {
    let redactions = 0;
    const items = raw.items.map((event) => {
      const report = this.redactor.sanitizeWithReport(event.message);
      redactions += report.total;
      return report.total ? { ...event, message: report.text } : event;
    });
    return { kind: 'events', items, truncated: raw.truncated, cached: raw.cached, redactions };
  }

  private decode<T>(request: RetrievalRequest, schema: z.ZodType<T[], z.ZodTypeDef, unknown>, payload: string) {
    let json: unknown;
    try {
      json = JSON.parse(payload);
    } catch (error) {
      this.logger.warn({ kind: request.kind, err: error }, 'cached payload is not valid JSON; refetching');
      return undefined;
    }
    const parsed = z.object({ items: schema, truncated: z.boolean() }).safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ kind: request.kind }, 'cached payload has an unexpected shape; refetching');
      return undefined;
    }
    return parsed.data;
  }

  private async readCache(request: RetrievalRequest, staging: StagedWrites | undefined): Promise<string | undefined> {
    if (!staging) {
      return this.cache.lookup(request);
    }
    const payload = await this.cache.peek(request);
    staging.recordAccess(request, payload !== undefined);
    return payload;
  }

  private async retrieve<T>(
    request: RetrievalRequest,
    schema: z.ZodType<T[], z.ZodTypeDef, unknown>,
    context: ToolCallContext,
    call: (signal: AbortSignal, limit: number) => Promise<T[]>
  ): Promise<RawResult<T>> {
    const canonical = canonicalizeRequest(request);
    throwIfAborted(context.signal);

    const payload = context.staging?.peek(canonical) ?? (await this.readCache(canonical, context.staging));
    if (payload !== undefined) {
      const decoded = this.decode(canonical, schema, payload);
      if (decoded) {
        this.logger.debug({ kind: canonical.kind, items: decoded.items.length }, 'cache hit');
        return { items: decoded.items, truncated: decoded.truncated, cached: true };
      }
    }

    const fetched = await withRetry(
      `logstore.${canonical.kind}`,
      (signal) => abortableCall(() => call(signal, canonical.limit + 1), signal),
      {
        ...this.retry,
        isRetryable: (error) => error instanceof RateLimitedError,
        signal: context.signal,
        logger: this.logger
      }
    );

    const truncated = fetched.length > canonical.limit;
    const items = truncated ? fetched.slice(0, canonical.limit) : fetched;
    const raw = JSON.stringify({ items, truncated });

    if (context.staging) {
      context.staging.stage(canonical, raw);
    } else {
      await this.cache.store(canonical, raw);
    }

    return { items, truncated, cached: false };
  }
}
