import { z } from 'zod';
import type { ToolName } from '../../../shared/types.js';
import type { SliceQuery } from '../cache/resultArchive.js';
import { requestSignature } from '../retrieval/request.js';
import type { RetrievalRequest, TimeWindow } from '../retrieval/request.js';
import { InvalidParametersError } from '../utils/errors.js';
import { formatInstant, parseTimeInput } from '../utils/time.js';

export interface EnumerateParams {
  prefix?: string;
  limit?: number;
}

export interface FetchParams {
  group: string;
  window: TimeWindow;
  filter?: string;
  limit?: number;
}

export interface SearchParams {
  groups: string[];
  window: TimeWindow;
  filter?: string;
  limit?: number;
}

export interface ArchiveReadParams extends SliceQuery {
  resultId: string;
}

export type ToolInvocation =
  | { tool: 'list_log_groups'; params: EnumerateParams }
  | { tool: 'fetch_logs'; params: FetchParams }
  | { tool: 'search_logs'; params: SearchParams }
  | { tool: 'fetch_cached_result'; params: ArchiveReadParams };

/** Invocations that read from the remote log store, as opposed to archived results. */
export type RetrievalInvocation = Exclude<ToolInvocation, { tool: 'fetch_cached_result' }>;

export const ARCHIVE_PAGE_DEFAULT = 100;
export const ARCHIVE_PAGE_MAX = 200;

export interface ToolSpec {
  type: 'function';
  function: {
    name: ToolName;
    description: string;
    parameters: Record<string, unknown>;
  };
}

const TIME_DESCRIPTION =
  "Relative ('1h ago', '30m ago', '2d ago', '1w ago', 'yesterday', 'now'), ISO-8601, or epoch milliseconds";

export const TOOL_SPECS: ToolSpec[] = [
  {
    type: 'function',
    function: {
      name: 'list_log_groups',
      description: 'List available log groups, optionally filtered by a name prefix.',
      parameters: {
        type: 'object',
        additionalProperties: false,
        properties: {
          prefix: { type: 'string', description: "Log group name prefix, e.g. '/aws/lambda/'" },
          limit: { type: 'integer', minimum: 1, description: 'Maximum number of groups to return' }
        }
      }
    }
  },
  {
    type: 'function',
    function: {
      name: 'fetch_logs',
      description:
        'Fetch log events from a single log group within a time range. Omitting start_time searches all retained history.',
      parameters: {
        type: 'object',
        additionalProperties: false,
        properties: {
          log_group: { type: 'string', description: 'Exact log group name' },
          start_time: { type: 'string', description: `Window start. ${TIME_DESCRIPTION}` },
          end_time: { type: 'string', description: `Window end, defaults to now. ${TIME_DESCRIPTION}` },
          filter_pattern: { type: 'string', description: 'Filter pattern passed through to the log store' },
          limit: { type: 'integer', minimum: 1, description: 'Maximum number of events to return' }
        },
        required: ['log_group']
      }
    }
  },
  {
    type: 'function',
    function: {
      name: 'search_logs',
      description:
        'Search several log groups at once for events matching a pattern within a time range. Events come back oldest first; when more match than the limit, the most recent ones are kept.',
      parameters: {
        type: 'object',
        additionalProperties: false,
        properties: {
          log_groups: { type: 'array', items: { type: 'string' }, minItems: 1, description: 'Log group names' },
          search_pattern: { type: 'string', description: 'Filter pattern passed through to the log store' },
          start_time: { type: 'string', description: `Window start. ${TIME_DESCRIPTION}` },
          end_time: { type: 'string', description: `Window end, defaults to now. ${TIME_DESCRIPTION}` },
          limit: { type: 'integer', minimum: 1, description: 'Maximum number of events to return' }
        },
        required: ['log_groups']
      }
    }
  },
  {
    type: 'function',
    function: {
      name: 'fetch_cached_result',
      description:
        'Page through a result that was too large to show in full. Use the result_id from its summary; narrow with filter_pattern or a time range.',
      parameters: {
        type: 'object',
        additionalProperties: false,
        properties: {
          result_id: { type: 'string', description: "The result_id from the summary, e.g. 'result_3f2a9c0d1e4b5a69'" },
          offset: { type: 'integer', minimum: 0, description: 'Index of the first matching event to return, default 0' },
          limit: {
            type: 'integer',
            minimum: 1,
            maximum: ARCHIVE_PAGE_MAX,
            description: `Number of events to return, default ${ARCHIVE_PAGE_DEFAULT}`
          },
          filter_pattern: { type: 'string', description: 'Case-insensitive text the event message must contain' },
          start_time: { type: 'string', description: `Only events at or after this time. ${TIME_DESCRIPTION}` },
          end_time: { type: 'string', description: `Only events at or before this time. ${TIME_DESCRIPTION}` }
        },
        required: ['result_id']
      }
    }
  }
];

const timeInput = z.union([z.string().trim().min(1), z.number()]);
const limitInput = z.coerce.number().int().positive().optional();

const listArgsSchema = z.object({
  prefix: z.string().optional(),
  limit: limitInput
});

const fetchArgsSchema = z.object({
  log_group: z.string().trim().min(1, 'log_group is required'),
  start_time: timeInput.optional(),
  end_time: timeInput.optional(),
  filter_pattern: z.string().optional(),
  limit: limitInput
});

const searchArgsSchema = z.object({
  log_groups: z.array(z.string().trim().min(1)).min(1, 'log_groups must name at least one group'),
  search_pattern: z.string().optional(),
  start_time: timeInput.optional(),
  end_time: timeInput.optional(),
  limit: limitInput
});

const archiveReadArgsSchema = z.object({
  result_id: z.string().trim().min(1, 'result_id is required'),
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(ARCHIVE_PAGE_MAX).default(ARCHIVE_PAGE_DEFAULT),
  filter_pattern: z.string().optional(),
  start_time: timeInput.optional(),
  end_time: timeInput.optional()
});

function parseArgs<T>(tool: ToolName, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidParametersError(`Invalid arguments for ${tool}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

function resolveWindow(startInput: string | number | undefined, endInput: string | number | undefined, now: number): TimeWindow {
  const end = endInput === undefined ? now : parseTimeInput(endInput, now);
  if (startInput === undefined) {
    return { end };
  }
  const start = parseTimeInput(startInput, now);
  if (start > end) {
    throw new InvalidParametersError(
      `start_time (${formatInstant(start)}) is after end_time (${formatInstant(end)})`
    );
  }
  return { start, end };
}

function decodeArguments(tool: string, rawArguments: string): unknown {
  if (!rawArguments.trim()) {
    return {};
  }
  try {
    return JSON.parse(rawArguments);
  } catch {
    throw new InvalidParametersError(`Arguments for ${tool} are not valid JSON`);
  }
}

/**
 * Turns a model tool call into a typed invocation, resolving relative
 * times against `now`. Throws InvalidParametersError for unknown tools or
 * bad arguments.
 */
export function parseToolInvocation(name: string, rawArguments: string, now: number): ToolInvocation {
  switch (name) {
    case 'list_log_groups': {
      const args = parseArgs(name, listArgsSchema, decodeArguments(name, rawArguments));
      return { tool: name, params: { prefix: args.prefix, limit: args.limit } };
    }
    case 'fetch_logs': {
      const args = parseArgs(name, fetchArgsSchema, decodeArguments(name, rawArguments));
      return {
        tool: name,
        params: {
          group: args.log_group,
          window: resolveWindow(args.start_time, args.end_time, now),
          filter: args.filter_pattern,
          limit: args.limit
        }
      };
    }
    case 'search_logs': {
      const args = parseArgs(name, searchArgsSchema, decodeArguments(name, rawArguments));
      return {
        tool: name,
        params: {
          groups: args.log_groups,
          window: resolveWindow(args.start_time, args.end_time, now),
          filter: args.search_pattern,
          limit: args.limit
        }
      };
    }
    case 'fetch_cached_result': {
      const args = parseArgs(name, archiveReadArgsSchema, decodeArguments(name, rawArguments));
      const start = args.start_time === undefined ? undefined : parseTimeInput(args.start_time, now);
      const end = args.end_time === undefined ? undefined : parseTimeInput(args.end_time, now);
      if (start !== undefined && end !== undefined && start > end) {
        throw new InvalidParametersError(
          `start_time (${formatInstant(start)}) is after end_time (${formatInstant(end)})`
        );
      }
      const filter = args.filter_pattern?.trim();
      return {
        tool: name,
        params: {
          resultId: args.result_id,
          offset: args.offset,
          limit: args.limit,
          ...(filter ? { filter } : {}),
          ...(start !== undefined ? { start } : {}),
          ...(end !== undefined ? { end } : {})
        }
      };
    }
    default:
      throw new InvalidParametersError(
        `Unknown tool '${name}'. Available tools: ${TOOL_SPECS.map((spec) => spec.function.name).join(', ')}`
      );
  }
}

export function effectiveLimit(requested: number | undefined, itemCap: number): number {
  return requested === undefined ? itemCap : Math.min(requested, itemCap);
}

export function isRetrievalInvocation(invocation: ToolInvocation): invocation is RetrievalInvocation {
  return invocation.tool !== 'fetch_cached_result';
}

export function toRetrievalRequest(invocation: RetrievalInvocation, itemCap: number): RetrievalRequest {
  switch (invocation.tool) {
    case 'list_log_groups':
      return {
        kind: 'enumerate',
        scope: { type: 'prefix', prefix: invocation.params.prefix ?? '' },
        limit: effectiveLimit(invocation.params.limit, itemCap)
      };
    case 'fetch_logs':
      return {
        kind: 'fetch',
        scope: { type: 'group', group: invocation.params.group },
        window: invocation.params.window,
        filter: invocation.params.filter,
        limit: effectiveLimit(invocation.params.limit, itemCap)
      };
    case 'search_logs':
      return {
        kind: 'search',
        scope: { type: 'groups', groups: invocation.params.groups },
        window: invocation.params.window,
        filter: invocation.params.filter,
        limit: effectiveLimit(invocation.params.limit, itemCap)
      };
  }
}

/** Identifies invocations that would return the same data, so a turn can run them once. */
export function invocationSignature(invocation: ToolInvocation, itemCap: number): string {
  if (!isRetrievalInvocation(invocation)) {
    return `archive:${JSON.stringify(invocationInput(invocation))}`;
  }
  return requestSignature(toRetrievalRequest(invocation, itemCap));
}

export function invocationWindow(invocation: RetrievalInvocation): TimeWindow | undefined {
  return invocation.tool === 'list_log_groups' ? undefined : invocation.params.window;
}

export function withWindow(invocation: RetrievalInvocation, window: TimeWindow): RetrievalInvocation {
  switch (invocation.tool) {
    case 'list_log_groups':
      return invocation;
    case 'fetch_logs':
      return { tool: invocation.tool, params: { ...invocation.params, window } };
    case 'search_logs':
      return { tool: invocation.tool, params: { ...invocation.params, window } };
  }
}

/** Serializable view of an invocation, used for tool call records and synthetic history entries. */
export function invocationInput(invocation: ToolInvocation): Record<string, unknown> {
  const windowFields = (window: TimeWindow) => ({
    ...(window.start !== undefined ? { start_time: formatInstant(window.start) } : {}),
    end_time: formatInstant(window.end)
  });

  switch (invocation.tool) {
    case 'list_log_groups':
      return {
        ...(invocation.params.prefix !== undefined ? { prefix: invocation.params.prefix } : {}),
        ...(invocation.params.limit !== undefined ? { limit: invocation.params.limit } : {})
      };
    case 'fetch_logs':
      return {
        log_group: invocation.params.group,
        ...windowFields(invocation.params.window),
        ...(invocation.params.filter !== undefined ? { filter_pattern: invocation.params.filter } : {}),
        ...(invocation.params.limit !== undefined ? { limit: invocation.params.limit } : {})
      };
    case 'search_logs':
      return {
        log_groups: invocation.params.groups,
        ...windowFields(invocation.params.window),
        ...(invocation.params.filter !== undefined ? { search_pattern: invocation.params.filter } : {}),
        ...(invocation.params.limit !== undefined ? { limit: invocation.params.limit } : {})
      };
    case 'fetch_cached_result':
      return {
        result_id: invocation.params.resultId,
        offset: invocation.params.offset,
        limit: invocation.params.limit,
        ...(invocation.params.filter !== undefined ? { filter_pattern: invocation.params.filter } : {}),
        ...(invocation.params.start !== undefined ? { start_time: formatInstant(invocation.params.start) } : {}),
        ...(invocation.params.end !== undefined ? { end_time: formatInstant(invocation.params.end) } : {})
      };
  }
}
