import { performance } from 'node:perf_hooks';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { LogEvent, LogGroupSummary } from '../../../shared/types.js';
import type { TimeWindow } from '../retrieval/request.js';
import {
  CancelledError,
  errorMessage,
  RateLimitedError,
  RemoteUnavailableError,
  ScopeNotFoundError
} from '../utils/errors.js';
import { redactSensitiveText } from '../utils/sanitize-text.js';
import { createComponentLogger } from '../utils/logger.js';
import type { RemoteCallOptions, RemoteLogStore } from './logStore.js';

const groupSchema = z.object({
  name: z.string(),
  createdAt: z.number().optional(),
  storedBytes: z.number().optional(),
  retentionDays: z.number().optional()
});

const eventSchema = z.object({
  timestamp: z.number(),
  message: z.string(),
  group: z.string(),
  stream: z.string().optional(),
  eventId: z.string().optional()
});

const groupsResponseSchema = z.object({ groups: z.array(groupSchema) });
const eventsResponseSchema = z.object({ events: z.array(eventSchema) });

export interface HttpLogStoreOptions {
  endpoint: string;
  apiKey?: string;
  logger?: Logger;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  body?: unknown;
  scope?: string;
  signal?: AbortSignal;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - Date.now());
}

/** Client of a JSON log-store API: `GET /groups`, `POST /groups/:name/events`, `POST /search`. */
export class HttpLogStore implements RemoteLogStore {
  private readonly endpoint: string;
  private readonly apiKey?: string;
  private readonly logger: Logger;

  constructor(options: HttpLogStoreOptions) {
    this.endpoint = options.endpoint.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.logger = options.logger ?? createComponentLogger('logstore');
  }

  async enumerateGroups(prefix: string | undefined, options: RemoteCallOptions): Promise<LogGroupSummary[]> {
    const params = new URLSearchParams({ limit: String(options.limit) });
    if (prefix) {
      params.set('prefix', prefix);
    }
    const json = await this.request('enumerateGroups', `/groups?${params.toString()}`, { signal: options.signal });
    return this.parse('enumerateGroups', groupsResponseSchema, json).groups;
  }

  async fetch(
    group: string,
    window: TimeWindow,
    filter: string | undefined,
    options: RemoteCallOptions
  ): Promise<LogEvent[]> {
    const json = await this.request('fetch', `/groups/${encodeURIComponent(group)}/events`, {
      method: 'POST',
      body: { start: window.start, end: window.end, filter, limit: options.limit },
      scope: group,
      signal: options.signal
    });
    return this.parse('fetch', eventsResponseSchema, json).events;
  }

  async search(
    groups: string[],
    window: TimeWindow,
    filter: string | undefined,
    options: RemoteCallOptions
  ): Promise<LogEvent[]> {
    const json = await this.request('search', '/search', {
      method: 'POST',
      body: { groups, start: window.start, end: window.end, filter, limit: options.limit },
      scope: groups.join(','),
      signal: options.signal
    });
    return this.parse('search', eventsResponseSchema, json).events;
  }

  private parse<T>(operation: string, schema: z.ZodType<T>, json: unknown): T {
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new RemoteUnavailableError(`${operation} returned an unexpected response shape: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async request(operation: string, path: string, options: RequestOptions): Promise<unknown> {
    const { method = 'GET', body, scope, signal } = options;
    const correlationId = randomUUID();
    const headers: Record<string, string> = { Accept: 'application/json', 'x-correlation-id': correlationId };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    const init: RequestInit = { method, headers, signal };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    const start = performance.now();
    this.logger.debug({ event: 'logstore.request.start', operation, method, path, correlationId });

    let response: Response;
    try {
      response = await fetch(`${this.endpoint}${path}`, init);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw new RemoteUnavailableError(`${operation} request failed: ${errorMessage(error)}`, { cause: error });
    }
    const durationMs = Math.round(performance.now() - start);

    if (!response.ok) {
      const errorText = redactSensitiveText(await response.text().catch(() => ''));
      this.logger.warn({
        event: 'logstore.request.error',
        operation,
        status: response.status,
        durationMs,
        error: errorText,
        correlationId
      });

      if (response.status === 404) {
        throw new ScopeNotFoundError(scope ?? path, errorText || undefined);
      }
      if (response.status === 429) {
        throw new RateLimitedError(
          `${operation} was rate limited by the log store`,
          parseRetryAfter(response.headers.get('retry-after'))
        );
      }
      throw new RemoteUnavailableError(
        `${operation} failed: ${response.status} ${response.statusText}${errorText ? ` - ${errorText}` : ''}`
      );
    }

    this.logger.debug({ event: 'logstore.request.completed', operation, status: response.status, durationMs, correlationId });

    try {
      return await response.json();
    } catch (error) {
      throw new RemoteUnavailableError(`${operation} returned invalid JSON`, { cause: error });
    }
  }
}
