import { describe, it, expect, vi } from 'vitest';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { MAX_MESSAGE_LENGTH, sanitizeInput } from '../middleware/sanitize.js';

describe('sanitizeInput middleware', () => {
  const createMockRequest = (body: unknown) => ({ body }) as FastifyRequest;

  const createMockReply = () => {
    const reply = {
      code: vi.fn().mockReturnThis(),
      send: vi.fn().mockReturnThis()
    };
    return reply as unknown as FastifyReply;
  };

  it('cleans markup and whitespace from the message', () => {
    const body = { message: '  <b>Why</b> did the API fail?\r\n\r\n\r\n\r\nSince noon.  ' };
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest(body), reply, done);

    expect(body.message).toBe('Why did the API fail?\n\nSince noon.');
    expect(reply.code).not.toHaveBeenCalled();
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects a non-string message', () => {
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest({ message: 42 }), reply, done);

    expect(reply.code).toHaveBeenCalledWith(400);
    expect(reply.send).toHaveBeenCalledWith({ error: 'Message must be a string.' });
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects messages over the length limit', () => {
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest({ message: 'a'.repeat(MAX_MESSAGE_LENGTH + 1) }), reply, done);

    expect(reply.code).toHaveBeenCalledWith(400);
    expect(reply.send).toHaveBeenCalledWith({ error: 'Message too long. Maximum 10000 characters.' });
  });

  it('accepts a message exactly at the length limit', () => {
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest({ message: 'a'.repeat(MAX_MESSAGE_LENGTH) }), reply, done);

    expect(reply.code).not.toHaveBeenCalled();
    expect(done).toHaveBeenCalledOnce();
  });

  it('rejects a message that is empty once scripts are stripped', () => {
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest({ message: '<script>alert(1)</script>   ' }), reply, done);

    expect(reply.code).toHaveBeenCalledWith(400);
    expect(reply.send).toHaveBeenCalledWith({ error: 'Message must not be empty.' });
  });

  it('passes through bodies without a message', () => {
    const reply = createMockReply();
    const done = vi.fn();

    sanitizeInput(createMockRequest(undefined), reply, done);
    sanitizeInput(createMockRequest({ other: 1 }), reply, done);

    expect(reply.code).not.toHaveBeenCalled();
    expect(done).toHaveBeenCalledTimes(2);
  });
});
