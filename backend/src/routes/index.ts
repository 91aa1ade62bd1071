import type { FastifyInstance } from 'fastify';
import type { ResultCache } from '../cache/resultCache.js';
import { config } from '../config/app.js';
import type { LogGroupCatalog } from '../orchestrator/groupCatalog.js';
import type { ConversationStore } from '../services/conversationStore.js';
import { setupTurnRoute } from './chatStream.js';

export interface AppServices {
  conversations: ConversationStore;
  cache: ResultCache;
  catalog?: LogGroupCatalog;
}

export async function registerRoutes(app: FastifyInstance, services: AppServices) {
  const { conversations, cache, catalog } = services;

  app.get('/', async () => ({
    name: config.PROJECT_NAME,
    status: 'ok',
    uptimeSeconds: Math.round(process.uptime()),
    endpoints: {
      health: '/health',
      turns: '/conversations/:id/turns',
      cancel: '/conversations/:id/cancel',
      toolCalls: '/conversations/:id/tool-calls',
      conversation: '/conversations/:id',
      cacheStats: '/cache/stats',
      cache: '/cache'
    }
  }));

  app.get('/health', async () => ({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    conversations: conversations.size,
    cacheEntries: cache.stats().entryCount,
    ...(catalog ? { logGroups: catalog.size } : {})
  }));

  app.post<{ Params: { id: string } }>('/conversations/:id/cancel', async (request, reply) => {
    const orchestrator = conversations.get(request.params.id);
    if (!orchestrator) {
      return reply.code(404).send({ error: 'Conversation not found.' });
    }
    return { cancelled: orchestrator.cancelTurn() };
  });

  app.get<{ Params: { id: string } }>('/conversations/:id/tool-calls', async (request, reply) => {
    const orchestrator = conversations.get(request.params.id);
    if (!orchestrator) {
      return reply.code(404).send({ error: 'Conversation not found.' });
    }
    return {
      conversationId: orchestrator.conversationId,
      busy: orchestrator.busy,
      toolCalls: orchestrator.getToolCalls()
    };
  });

  app.delete<{ Params: { id: string } }>('/conversations/:id', async (request, reply) => {
    if (!conversations.delete(request.params.id)) {
      return reply.code(404).send({ error: 'Conversation not found.' });
    }
    return reply.code(204).send();
  });

  app.get('/cache/stats', async () => cache.stats());

  app.delete('/cache', async () => {
    await cache.clear();
    return { status: 'cleared' };
  });

  await setupTurnRoute(app, conversations);
}
