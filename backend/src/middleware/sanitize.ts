import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';
import { sanitizeUserContent } from '../utils/sanitize-text.js';

export const MAX_MESSAGE_LENGTH = 10000;

/** Validates and cleans the `message` field of turn requests. Other bodies pass through. */
export function sanitizeInput(request: FastifyRequest, reply: FastifyReply, done: HookHandlerDoneFunction) {
  const body = request.body;

  if (body && typeof body === 'object' && 'message' in body) {
    if (typeof body.message !== 'string') {
      reply.code(400).send({ error: 'Message must be a string.' });
      return done();
    }

    if (body.message.length > MAX_MESSAGE_LENGTH) {
      reply.code(400).send({ error: `Message too long. Maximum ${MAX_MESSAGE_LENGTH} characters.` });
      return done();
    }

    const content = sanitizeUserContent(body.message);
    if (!content) {
      reply.code(400).send({ error: 'Message must not be empty.' });
      return done();
    }

    body.message = content;
  }

  done();
}
