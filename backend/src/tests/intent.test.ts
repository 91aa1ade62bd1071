import { describe, it, expect } from 'vitest';
import { DEFAULT_INTENT_RULES, detectPrematureGivingUp, detectStatedIntent } from '../orchestrator/intent.js';
import type { IntentRule } from '../orchestrator/intent.js';

describe('detectStatedIntent', () => {
  it('detects a stated search', () => {
    expect(detectStatedIntent('Let me check the error logs for the API.')).toEqual({
      kind: 'search_logs',
      confidence: 0.9,
      trigger: 'Let me check'
    });
  });

  it('detects a stated group listing', () => {
    expect(detectStatedIntent("I'll list the available log groups first.")).toMatchObject({
      kind: 'list_groups',
      trigger: "I'll list the available log groups"
    });
  });

  it('detects a stated window expansion at the default threshold', () => {
    expect(detectStatedIntent('Nothing yet, so I will widen the time range.')).toMatchObject({
      kind: 'expand_time',
      trigger: 'widen the time range'
    });
  });

  it('ignores rules below the threshold', () => {
    expect(detectStatedIntent('Nothing yet, so I will widen the time range.', DEFAULT_INTENT_RULES, 0.85)).toBeUndefined();
  });

  it('ignores statements about work that needs no tool', () => {
    expect(detectStatedIntent("I'll summarize the results below.")).toBeUndefined();
  });

  it('ignores plain answers', () => {
    expect(detectStatedIntent('The errors started at 10:02, right after the deploy.')).toBeUndefined();
    expect(detectStatedIntent('   ')).toBeUndefined();
  });

  it('accepts a replacement rule set', () => {
    const rules: IntentRule[] = [{ kind: 'search_logs', pattern: /\bone moment\b/i, confidence: 1, needsTool: true }];

    expect(detectStatedIntent('One moment please', rules)).toEqual({
      kind: 'search_logs',
      confidence: 1,
      trigger: 'One moment'
    });
    expect(detectStatedIntent('Let me check the logs', rules)).toBeUndefined();
  });
});

describe('detectPrematureGivingUp', () => {
  it('returns the phrase that concludes nothing exists', () => {
    expect(detectPrematureGivingUp('No logs were found for the API in that hour.')).toBe('No logs were found');
    expect(detectPrematureGivingUp("I couldn't find any errors.")).toBe("couldn't find any");
    expect(detectPrematureGivingUp('There are no matching logs in /app/api.')).toBe('There are no matching logs');
  });

  it('ignores answers that report findings', () => {
    expect(detectPrematureGivingUp('Three timeouts were found between 10:00 and 10:05.')).toBeUndefined();
  });

  it('accepts a replacement phrase list', () => {
    expect(detectPrematureGivingUp('Nada.', [/\bnada\b/i])).toBe('Nada');
    expect(detectPrematureGivingUp('No logs were found.', [/\bnada\b/i])).toBeUndefined();
  });
});
