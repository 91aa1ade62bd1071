import { describe, it, expect } from 'vitest';
import { formatDuration, formatInstant, parseTimeInput } from '../utils/time.js';
import { InvalidParametersError } from '../utils/errors.js';

const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);
const HOUR = 60 * 60 * 1000;

describe('parseTimeInput', () => {
  it('resolves relative forms against now', () => {
    expect(parseTimeInput('1h ago', NOW)).toBe(NOW - HOUR);
    expect(parseTimeInput('30 m ago', NOW)).toBe(NOW - 30 * 60 * 1000);
    expect(parseTimeInput('2d ago', NOW)).toBe(NOW - 48 * HOUR);
    expect(parseTimeInput('1w ago', NOW)).toBe(NOW - 7 * 24 * HOUR);
    expect(parseTimeInput('NOW', NOW)).toBe(NOW);
    expect(parseTimeInput('yesterday', NOW)).toBe(NOW - 24 * HOUR);
  });

  it('parses ISO-8601 timestamps', () => {
    expect(parseTimeInput('2024-01-15T10:00:00Z', NOW)).toBe(Date.UTC(2024, 0, 15, 10, 0, 0));
  });

  it('treats small epoch values as seconds', () => {
    expect(parseTimeInput('1705320000', NOW)).toBe(1705320000000);
    expect(parseTimeInput(1705320000000, NOW)).toBe(1705320000000);
  });

  it('rejects unrecognised input', () => {
    expect(() => parseTimeInput('soonish', NOW)).toThrow(InvalidParametersError);
    expect(() => parseTimeInput(-5, NOW)).toThrow('Invalid epoch timestamp: -5');
  });

  it('rejects instants a Date cannot represent', () => {
    expect(() => parseTimeInput(1e16, NOW)).toThrow("Time '10000000000000000' is outside the supported date range.");
    expect(() => parseTimeInput('99999999999w ago', NOW)).toThrow(InvalidParametersError);
    expect(parseTimeInput(8.64e15, NOW)).toBe(8.64e15);
  });
});

describe('formatDuration', () => {
  it('uses the largest unit that divides the duration', () => {
    expect(formatDuration(HOUR)).toBe('1h');
    expect(formatDuration(64 * HOUR)).toBe('64h');
    expect(formatDuration(48 * HOUR)).toBe('2d');
    expect(formatDuration(7 * 24 * HOUR)).toBe('1w');
    expect(formatDuration(90 * 60 * 1000)).toBe('90m');
    expect(formatDuration(1500)).toBe('1500ms');
  });
});

describe('formatInstant', () => {
  it('renders ISO-8601 in UTC', () => {
    expect(formatInstant(NOW)).toBe('2024-01-15T12:00:00.000Z');
  });
});
