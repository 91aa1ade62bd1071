import type { Logger } from 'pino';
import type { Orchestrator } from '../orchestrator/index.js';
import { createComponentLogger } from '../utils/logger.js';

const CONVERSATION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function isValidConversationId(id: string): boolean {
  return CONVERSATION_ID_PATTERN.test(id);
}

export type OrchestratorFactory = (conversationId: string) => Orchestrator;

export interface ConversationStoreOptions {
  /** Conversations idle for longer are dropped by `sweepIdle`. Unset keeps them forever. */
  idleMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * In-memory registry of live conversations; transcripts are not persisted.
 * A conversation with a running turn is never expired.
 */
export class ConversationStore {
  private readonly conversations = new Map<string, Orchestrator>();
  private readonly factory: OrchestratorFactory;
  private readonly idleMs?: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(factory: OrchestratorFactory, options: ConversationStoreOptions = {}) {
    this.factory = factory;
    this.idleMs = options.idleMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createComponentLogger('conversations');
  }

  get(conversationId: string): Orchestrator | undefined {
    return this.conversations.get(conversationId);
  }

  getOrCreate(conversationId: string): Orchestrator {
    const existing = this.conversations.get(conversationId);
    if (existing) {
      return existing;
    }
    this.sweepIdle();
    const created = this.factory(conversationId);
    this.conversations.set(conversationId, created);
    return created;
  }

  /** Drops a conversation, cancelling its running turn first. */
  delete(conversationId: string): boolean {
    const existing = this.conversations.get(conversationId);
    if (!existing) {
      return false;
    }
    existing.cancelTurn();
    return this.conversations.delete(conversationId);
  }

  sweepIdle(): number {
    if (this.idleMs === undefined) {
      return 0;
    }
    const cutoff = this.now() - this.idleMs;
    const expired = Array.from(this.conversations.values()).filter(
      (conversation) => !conversation.busy && conversation.lastActiveAt < cutoff
    );
    for (const conversation of expired) {
      this.conversations.delete(conversation.conversationId);
    }
    if (expired.length) {
      this.logger.info({ expired: expired.length, remaining: this.conversations.size }, 'expired idle conversations');
    }
    return expired.length;
  }

  get size(): number {
    return this.conversations.size;
  }
}
