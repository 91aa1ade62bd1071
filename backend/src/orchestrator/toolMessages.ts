import type { LogEvent, LogGroupSummary } from '../../../shared/types.js';
import type { ArchiveSummary } from '../cache/resultArchive.js';
import type { EventListResult, GroupListResult, ToolResult } from '../tools/index.js';
import { errorMessage, LogscopeError } from '../utils/errors.js';
import { formatInstant } from '../utils/time.js';
import { fitItemsToBudget } from './contextBudget.js';

const TRUNCATION_NOTE =
  'More results exist than were returned. Narrow the time range or add a filter pattern to see the rest.';

const ARCHIVE_NOTE =
  'This result was too large to include in full. Call fetch_cached_result with this result_id and an offset and limit to read the events, optionally narrowed by filter_pattern or a time range.';

const SAMPLE_MESSAGE_CHARS = 500;

export function isEmptyResult(result: ToolResult): boolean {
  return result.items.length === 0 && !result.failures?.length;
}

export function summarizeResult(result: ToolResult): string {
  const noun = result.kind === 'groups' ? 'log group' : 'event';
  const count = result.items.length;
  const parts = [`${count} ${noun}${count === 1 ? '' : 's'}`];
  if (result.kind === 'events' && result.page) {
    parts.push(`of ${result.page.totalMatching} matching in ${result.page.resultId}`);
  }
  if (result.truncated) parts.push('truncated');
  if (result.cached) parts.push('cached');
  if (result.redactions) parts.push(`${result.redactions} redacted`);
  if (result.failures?.length) {
    parts.push(`${result.failures.length} scope${result.failures.length === 1 ? '' : 's'} failed`);
  }
  return parts.join(', ');
}

function renderGroups(result: GroupListResult, kept: LogGroupSummary[], omitted: number): string {
  return JSON.stringify({
    log_groups: kept.map((group) => group.name),
    count: result.items.length,
    truncated: result.truncated,
    ...(omitted ? { omitted_for_length: omitted } : {}),
    ...(result.truncated ? { note: TRUNCATION_NOTE } : {})
  });
}

function eventView(event: LogEvent, maxMessageChars = Infinity) {
  const message =
    event.message.length > maxMessageChars ? `${event.message.slice(0, maxMessageChars)}...` : event.message;
  return {
    timestamp: formatInstant(event.timestamp),
    log_group: event.group,
    ...(event.stream ? { log_stream: event.stream } : {}),
    message
  };
}

function pageNote(result: EventListResult, kept: LogEvent[], omitted: number): string | undefined {
  const page = result.page;
  if (!page || (!page.hasMore && !omitted)) {
    return undefined;
  }
  return `More events match. Call fetch_cached_result again with offset ${page.offset + kept.length}.`;
}

function renderEvents(result: EventListResult, kept: LogEvent[], omitted: number): string {
  const note = result.page ? pageNote(result, kept, omitted) : result.truncated ? TRUNCATION_NOTE : undefined;
  return JSON.stringify({
    events: kept.map((event) => eventView(event)),
    count: result.items.length,
    truncated: result.truncated,
    ...(result.page
      ? {
          result_id: result.page.resultId,
          offset: result.page.offset,
          total_matching: result.page.totalMatching,
          has_more: result.page.hasMore || omitted > 0
        }
      : {}),
    ...(omitted ? { omitted_for_length: omitted } : {}),
    ...(result.failures?.length ? { partial_failures: result.failures } : {}),
    ...(result.redactions ? { redacted_values: result.redactions } : {}),
    ...(note ? { note } : {})
  });
}

/**
 * Serializes a result for the model, dropping trailing items that do not fit
 * in `maxTokens`. `omitted` counts the dropped items.
 */
export function fitToolResult(result: ToolResult, model: string, maxTokens: number): { content: string; omitted: number } {
  if (result.kind === 'groups') {
    return fitItemsToBudget(model, result.items, maxTokens, (kept, omitted) => renderGroups(result, kept, omitted));
  }
  return fitItemsToBudget(model, result.items, maxTokens, (kept, omitted) => renderEvents(result, kept, omitted));
}

export function renderToolResult(result: ToolResult, model: string, maxTokens: number): string {
  return fitToolResult(result, model, maxTokens).content;
}

/** Stands in for an event list that was archived because it did not fit. */
export function renderArchivedSummary(result: EventListResult, summary: ArchiveSummary): string {
  return JSON.stringify({
    result_id: summary.resultId,
    archived: true,
    summary: {
      total_events: summary.totalEvents,
      ...(summary.timeRange
        ? { time_range: { start: formatInstant(summary.timeRange.start), end: formatInstant(summary.timeRange.end) } }
        : {}),
      levels: summary.levels,
      sample_events: summary.samples.map((event) => eventView(event, SAMPLE_MESSAGE_CHARS))
    },
    truncated: result.truncated,
    ...(result.failures?.length ? { partial_failures: result.failures } : {}),
    ...(result.redactions ? { redacted_values: result.redactions } : {}),
    note: ARCHIVE_NOTE
  });
}

export function errorCode(error: unknown): string {
  return error instanceof LogscopeError ? error.code : 'internal_error';
}

export function renderToolError(error: unknown): string {
  return JSON.stringify({ error: { code: errorCode(error), message: errorMessage(error) } });
}

export function renderNotDispatched(code: string, message: string): string {
  return JSON.stringify({ error: { code, message } });
}
