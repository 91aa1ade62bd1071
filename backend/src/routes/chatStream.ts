import type { FastifyInstance } from 'fastify';
import type { TurnRequestPayload } from '../../../shared/types.js';
import { handleTurnStream } from '../services/chatStreamService.js';
import { isValidConversationId } from '../services/conversationStore.js';
import type { ConversationStore } from '../services/conversationStore.js';
import { errorCode } from '../orchestrator/toolMessages.js';
import { errorMessage } from '../utils/errors.js';

export const TURN_ROUTE = '/conversations/:id/turns';

export async function setupTurnRoute(app: FastifyInstance, conversations: ConversationStore) {
  app.post<{ Params: { id: string }; Body: TurnRequestPayload }>(TURN_ROUTE, async (request, reply) => {
    const { id } = request.params;
    if (!isValidConversationId(id)) {
      return reply.code(400).send({ error: 'Invalid conversation id.' });
    }

    const message = request.body?.message;
    if (typeof message !== 'string' || !message) {
      return reply.code(400).send({ error: 'Message required.' });
    }

    const orchestrator = conversations.getOrCreate(id);
    if (orchestrator.busy) {
      return reply.code(409).send({ error: `A turn is already running for conversation ${id}.` });
    }

    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });

    let finished = false;
    reply.raw.on('close', () => {
      if (!finished) {
        request.log.info({ conversationId: id }, 'client disconnected; cancelling turn');
        orchestrator.cancelTurn();
      }
    });

    const sendEvent = (event: string, data: unknown) => {
      reply.raw.write(`event: ${event}\n`);
      reply.raw.write(`data: ${JSON.stringify(data)}\n\n`);
    };

    try {
      await handleTurnStream(orchestrator, message, sendEvent);
    } catch (error) {
      request.log.error({ err: error, conversationId: id }, 'turn stream failed');
      sendEvent('error', { code: errorCode(error), message: errorMessage(error) });
    } finally {
      finished = true;
      reply.raw.end();
    }
  });
}
