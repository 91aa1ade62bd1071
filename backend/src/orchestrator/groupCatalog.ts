import type { Logger } from 'pino';
import type { LogGroupSummary } from '../../../shared/types.js';
import type { RemoteLogStore } from '../logstore/logStore.js';
import { errorMessage } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';

export const FULL_LIST_THRESHOLD = 500;
const MAX_CATALOG_GROUPS = 5000;
const SAMPLE_PER_PREFIX = 3;

/** Category of a group name: its first two path segments, e.g. `/aws/lambda`. */
export function groupPrefix(name: string): string {
  const segments = name.split('/').filter(Boolean);
  if (segments.length <= 1) {
    return name.startsWith('/') ? `/${segments[0] ?? ''}` : (segments[0] ?? name);
  }
  return `${name.startsWith('/') ? '/' : ''}${segments.slice(0, 2).join('/')}`;
}

/**
 * Log groups known at startup, rendered into the system prompt so the model
 * can pick real group names without a listing call.
 */
export class LogGroupCatalog {
  private groups: LogGroupSummary[] = [];
  private loadedAt?: number;
  private readonly remote: RemoteLogStore;
  private readonly logger: Logger;

  constructor(remote: RemoteLogStore, logger: Logger = createComponentLogger('group-catalog')) {
    this.remote = remote;
    this.logger = logger;
  }

  /** Reloads the catalog. Failures leave the previous contents in place and are reported as false. */
  async refresh(now: number = Date.now()): Promise<boolean> {
    try {
      const groups = await this.remote.enumerateGroups(undefined, { limit: MAX_CATALOG_GROUPS });
      this.groups = [...groups].sort((a, b) => a.name.localeCompare(b.name));
      this.loadedAt = now;
      this.logger.info({ groups: this.groups.length }, 'log group catalog loaded');
      return true;
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'log group catalog unavailable');
      return false;
    }
  }

  get size(): number {
    return this.groups.length;
  }

  get lastLoadedAt(): number | undefined {
    return this.loadedAt;
  }

  promptContext(): string | undefined {
    if (this.loadedAt === undefined) {
      return undefined;
    }
    if (this.groups.length === 0) {
      return 'No log groups were found in the log store.';
    }
    if (this.groups.length <= FULL_LIST_THRESHOLD) {
      return [`Available log groups (${this.groups.length}):`, ...this.groups.map((group) => `- ${group.name}`)].join('\n');
    }

    const byPrefix = new Map<string, string[]>();
    for (const group of this.groups) {
      const prefix = groupPrefix(group.name);
      const names = byPrefix.get(prefix) ?? [];
      names.push(group.name);
      byPrefix.set(prefix, names);
    }
    const lines = Array.from(byPrefix.entries())
      .sort((a, b) => b[1].length - a[1].length)
      .map(([prefix, names]) => {
        const sample = names.slice(0, SAMPLE_PER_PREFIX).join(', ');
        return `- ${prefix} (${names.length} groups, e.g. ${sample})`;
      });
    return [
      `There are ${this.groups.length} log groups; use list_log_groups with a prefix to find exact names.`,
      'Groups by prefix:',
      ...lines
    ].join('\n');
  }
}
