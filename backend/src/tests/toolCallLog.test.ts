import { describe, it, expect, vi } from 'vitest';
import { ToolCallLog } from '../orchestrator/toolCallLog.js';

describe('ToolCallLog', () => {
  it('numbers records in dispatch order', () => {
    const log = new ToolCallLog();
    log.begin('call_1', 'fetch_logs', { log_group: '/a' });
    log.begin('call_2', 'search_logs', { log_groups: ['/a', '/b'] });

    expect(log.snapshot().map((record) => [record.id, record.sequence, record.status])).toEqual([
      ['call_1', 1, 'pending'],
      ['call_2', 2, 'pending']
    ]);
  });

  it('replaces records instead of mutating them', () => {
    const log = new ToolCallLog();
    const pending = log.begin('call_1', 'fetch_logs', {});
    const done = log.update('call_1', { status: 'succeeded', resultSummary: '0 events' });

    expect(pending.status).toBe('pending');
    expect(done).toMatchObject({ id: 'call_1', sequence: 1, status: 'succeeded', resultSummary: '0 events' });
    expect(Object.isFrozen(done)).toBe(true);
    expect(log.get('call_1')).toBe(done);
  });

  it('reports every change to the listener', () => {
    const listener = vi.fn();
    const log = new ToolCallLog(listener);
    log.begin('call_1', 'fetch_logs', {}, { expansionOf: 'call_0', attempt: 1 });
    log.update('call_1', { status: 'running' });

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[0][0]).toMatchObject({ status: 'pending', expansionOf: 'call_0', attempt: 1 });
    expect(listener.mock.calls[1][0]).toMatchObject({ status: 'running' });
  });

  it('rejects duplicate and unknown ids', () => {
    const log = new ToolCallLog();
    log.begin('call_1', 'fetch_logs', {});

    expect(() => log.begin('call_1', 'fetch_logs', {})).toThrow('Duplicate tool call id call_1');
    expect(() => log.update('call_9', { status: 'failed' })).toThrow('Unknown tool call id call_9');
  });

  it('hands out frozen snapshots', () => {
    const log = new ToolCallLog();
    log.begin('call_1', 'fetch_logs', {});
    const snapshot = log.snapshot();
    log.begin('call_2', 'fetch_logs', {});

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toHaveLength(1);
    expect(log.size).toBe(2);
  });
});
