import type { LogEvent, LogGroupSummary } from '../../../shared/types.js';
import type { TimeWindow } from '../retrieval/request.js';

export interface RemoteCallOptions {
  limit: number;
  signal?: AbortSignal;
}

/**
 * Remote log store boundary. Implementations fail with ScopeNotFoundError,
 * RateLimitedError or RemoteUnavailableError.
 */
export interface RemoteLogStore {
  enumerateGroups(prefix: string | undefined, options: RemoteCallOptions): Promise<LogGroupSummary[]>;
  fetch(group: string, window: TimeWindow, filter: string | undefined, options: RemoteCallOptions): Promise<LogEvent[]>;
  search(
    groups: string[],
    window: TimeWindow,
    filter: string | undefined,
    options: RemoteCallOptions
  ): Promise<LogEvent[]>;
}
