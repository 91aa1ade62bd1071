import { InvalidParametersError } from './errors.js';

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000
};

const RELATIVE_PATTERN = /^(\d+)\s*([smhdw])\s*ago$/;

// Largest instant a Date can hold.
const MAX_INSTANT_MS = 8.64e15;

// Anything below this is taken to be epoch seconds.
const EPOCH_MS_THRESHOLD = 10_000_000_000;

/**
 * Resolves a model-supplied time to epoch milliseconds.
 *
 * Accepts relative forms (`"1h ago"`, `"30m ago"`, `"2d ago"`, `"1w ago"`,
 * `"now"`, `"yesterday"`), ISO-8601 strings and epoch numbers in seconds or
 * milliseconds.
 */
export function parseTimeInput(input: string | number, now: number): number {
  const resolved = resolveTimeInput(input, now);
  if (!isRepresentableInstant(resolved)) {
    throw new InvalidParametersError(`Time '${input}' is outside the supported date range.`);
  }
  return resolved;
}

export function isRepresentableInstant(epochMs: number): boolean {
  return Number.isFinite(epochMs) && Math.abs(epochMs) <= MAX_INSTANT_MS;
}

function resolveTimeInput(input: string | number, now: number): number {
  if (typeof input === 'number') {
    return normalizeEpoch(input);
  }

  const value = input.trim().toLowerCase();
  if (value === 'now') {
    return now;
  }
  if (value === 'yesterday') {
    return now - UNIT_MS.d;
  }

  const relative = RELATIVE_PATTERN.exec(value);
  if (relative) {
    return now - Number(relative[1]) * UNIT_MS[relative[2]];
  }

  if (/^\d+$/.test(value)) {
    return normalizeEpoch(Number(value));
  }

  const parsed = Date.parse(input.trim());
  if (Number.isNaN(parsed)) {
    throw new InvalidParametersError(
      `Unrecognised time '${input}'. Use forms like '1h ago', '30m ago', 'yesterday', 'now', an ISO-8601 timestamp or epoch milliseconds.`
    );
  }
  return parsed;
}

function normalizeEpoch(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidParametersError(`Invalid epoch timestamp: ${value}`);
  }
  return value < EPOCH_MS_THRESHOLD ? value * 1000 : value;
}

export function formatInstant(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/** Renders a duration as the largest whole unit that divides it, e.g. `4h`, `90m`. */
export function formatDuration(ms: number): string {
  for (const unit of ['w', 'd', 'h', 'm', 's']) {
    const size = UNIT_MS[unit];
    if (ms >= size && ms % size === 0) {
      return `${ms / size}${unit}`;
    }
  }
  return `${ms}ms`;
}
