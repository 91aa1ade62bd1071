import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { confidenceBucket, OtelTurnMetrics, traced } from '../utils/telemetry.js';

function fakeMeter() {
  const counters = new Map<string, Mock>();
  const meter = {
    createCounter: (name: string) => {
      const add = vi.fn();
      counters.set(name, add);
      return { add };
    }
  };
  const addsTo = (name: string) => counters.get(name)?.mock.calls ?? [];
  return { meter, addsTo };
}

describe('OtelTurnMetrics', () => {
  it('labels retries by reason', () => {
    const { meter, addsTo } = fakeMeter();
    const metrics = new OtelTurnMetrics(meter);

    metrics.retryAttempt('empty_result');
    metrics.retryAttempt('premature_giving_up');

    expect(addsTo('retry_attempts')).toEqual([
      [1, { reason: 'empty_result' }],
      [1, { reason: 'premature_giving_up' }]
    ]);
  });

  it('buckets intent confidence', () => {
    const { meter, addsTo } = fakeMeter();
    const metrics = new OtelTurnMetrics(meter);

    metrics.intentDetected('search_logs', 0.9);
    metrics.intentDetected('expand_time', 0.8);

    expect(addsTo('intent_detection_hits')).toEqual([
      [1, { intent_type: 'search_logs', confidence_bucket: 'high' }],
      [1, { intent_type: 'expand_time', confidence_bucket: 'medium' }]
    ]);
  });

  it('counts pruned messages and archived results', () => {
    const { meter, addsTo } = fakeMeter();
    const metrics = new OtelTurnMetrics(meter);

    metrics.historyPruned(4);
    metrics.resultArchived('search_logs');

    expect(addsTo('history_pruned')).toEqual([[4]]);
    expect(addsTo('results_archived')).toEqual([[1, { tool: 'search_logs' }]]);
  });

  it('works against the global meter without a registered provider', () => {
    const metrics = new OtelTurnMetrics();

    expect(() => metrics.retryAttempt('intent_without_action')).not.toThrow();
  });
});

describe('confidenceBucket', () => {
  it('splits at 0.9 and 0.7', () => {
    expect([0.95, 0.9, 0.89, 0.7, 0.69].map(confidenceBucket)).toEqual(['high', 'high', 'medium', 'medium', 'low']);
  });
});

describe('traced', () => {
  it('returns the result of the wrapped call', async () => {
    await expect(traced('test.op', async () => 42)).resolves.toBe(42);
  });

  it('rethrows failures', async () => {
    await expect(
      traced('test.op', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});
