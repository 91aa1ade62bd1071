import { createHash } from 'node:crypto';

export type RetrievalKind = 'enumerate' | 'fetch' | 'search';

export type RetrievalScope =
  | { type: 'prefix'; prefix: string }
  | { type: 'group'; group: string }
  | { type: 'groups'; groups: string[] };

/** Epoch milliseconds. A window without `start` is open-ended into the past. */
export interface TimeWindow {
  start?: number;
  end: number;
}

export interface RetrievalRequest {
  kind: RetrievalKind;
  scope: RetrievalScope;
  window?: TimeWindow;
  filter?: string;
  limit: number;
}

function floorToSecond(epochMs: number): number {
  return Math.floor(epochMs / 1000) * 1000;
}

function canonicalScope(scope: RetrievalScope): RetrievalScope {
  switch (scope.type) {
    case 'prefix':
      return { type: 'prefix', prefix: scope.prefix.trim().toLowerCase() };
    case 'group':
      return { type: 'group', group: scope.group.trim() };
    case 'groups': {
      const groups = Array.from(new Set(scope.groups.map((group) => group.trim()).filter(Boolean))).sort();
      return { type: 'groups', groups };
    }
  }
}

export function canonicalizeRequest(request: RetrievalRequest): RetrievalRequest {
  const filter = request.filter?.trim();
  const canonical: RetrievalRequest = {
    kind: request.kind,
    scope: canonicalScope(request.scope),
    limit: request.limit
  };
  if (request.window) {
    canonical.window =
      request.window.start === undefined
        ? { end: floorToSecond(request.window.end) }
        : { start: floorToSecond(request.window.start), end: floorToSecond(request.window.end) };
  }
  if (filter) {
    canonical.filter = filter;
  }
  return canonical;
}

/** SHA-256 over a fixed-order serialization of the canonical request. */
export function requestSignature(request: RetrievalRequest): string {
  const canonical = canonicalizeRequest(request);
  const serialized = JSON.stringify({
    kind: canonical.kind,
    scope: canonical.scope,
    start: canonical.window?.start ?? null,
    end: canonical.window?.end ?? null,
    filter: canonical.filter ?? null,
    limit: canonical.limit
  });
  return createHash('sha256').update(serialized).digest('hex');
}

export function isBoundedWindow(window: TimeWindow | undefined): window is Required<TimeWindow> {
  return window !== undefined && window.start !== undefined;
}

export function describeScope(scope: RetrievalScope): string {
  switch (scope.type) {
    case 'prefix':
      return scope.prefix ? `prefix '${scope.prefix}'` : 'all groups';
    case 'group':
      return scope.group;
    case 'groups':
      return scope.groups.join(', ');
  }
}
