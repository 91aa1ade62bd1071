import { describe, it, expect } from 'vitest';
import { ResultCache } from '../cache/resultCache.js';
import { Orchestrator } from '../orchestrator/index.js';
import { ConversationStore, isValidConversationId } from '../services/conversationStore.js';
import { ToolAdapter } from '../tools/index.js';
import { createRedactor } from '../utils/sanitize-text.js';
import { answer, callTools, FakeLogStore, ScriptedModel, toolCall } from './fakes.js';
import type { ScriptedStep } from './fakes.js';

const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);
const MINUTE = 60 * 1000;

function setup(script: ScriptedStep[] = [answer('All quiet.')]) {
  let clock = NOW;
  const now = () => clock;
  const remote = new FakeLogStore();
  const cache = new ResultCache({ capacityBytes: 1024 * 1024, ttlMs: 60 * MINUTE, now });
  const tools = new ToolAdapter({ remote, cache, redactor: createRedactor(), itemCap: 100, retry: { maxRetries: 0 } });
  const store = new ConversationStore(
    (conversationId) =>
      new Orchestrator({
        conversationId,
        model: new ScriptedModel(script),
        tools,
        cache,
        settings: {
          maxToolIterations: 10,
          expansion: { enabled: false, maxRetryAttempts: 3, factor: 4 },
          intentDetection: false,
          maxResultTokens: 8000,
          maxHistoryTokens: 60000,
          itemCap: 100
        },
        now
      }),
    { idleMs: 30 * MINUTE, now }
  );
  const advance = (ms: number) => {
    clock += ms;
  };
  return { store, remote, advance };
}

describe('ConversationStore', () => {
  it('reuses a live conversation', () => {
    const { store } = setup();

    const first = store.getOrCreate('conv-1');

    expect(store.getOrCreate('conv-1')).toBe(first);
    expect(store.size).toBe(1);
  });

  it('expires conversations idle past the limit', async () => {
    const { store, advance } = setup();
    await store.getOrCreate('stale').runTurn('Anything wrong?');
    advance(20 * MINUTE);
    store.getOrCreate('recent');

    advance(10 * MINUTE + 1);
    expect(store.sweepIdle()).toBe(1);

    expect(store.get('stale')).toBeUndefined();
    expect(store.get('recent')).toBeDefined();
  });

  it('drops idle conversations before creating a new one', () => {
    const { store, advance } = setup();
    store.getOrCreate('stale');
    advance(31 * MINUTE);

    store.getOrCreate('fresh');

    expect(store.size).toBe(1);
    expect(store.get('fresh')).toBeDefined();
  });

  it('never expires a conversation with a running turn', async () => {
    const { store, remote, advance } = setup([
      callTools(toolCall('call_1', 'fetch_logs', { log_group: '/slow', start_time: '1h ago' }))
    ]);
    remote.hanging.add('/slow');
    const conversation = store.getOrCreate('busy');
    let swept: number | undefined;
    remote.onCall = () => {
      advance(31 * MINUTE);
      swept = store.sweepIdle();
      conversation.cancelTurn();
    };

    await conversation.runTurn('Check the slow service');

    expect(swept).toBe(0);
    expect(store.get('busy')).toBe(conversation);
  });

  it('keeps every conversation when no idle limit is set', () => {
    const store = new ConversationStore(() => {
      throw new Error('not used');
    });

    expect(store.sweepIdle()).toBe(0);
  });

  it('accepts url-safe conversation ids only', () => {
    expect(isValidConversationId('conv_1-a')).toBe(true);
    expect(isValidConversationId('../etc')).toBe(false);
    expect(isValidConversationId('')).toBe(false);
  });
});
