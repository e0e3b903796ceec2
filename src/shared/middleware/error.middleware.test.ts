import { describe, it, expect, vi } from 'vitest';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { errorHandler } from './error.middleware.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

// ============================================================================
// Test Helpers
// ============================================================================

function createMockRequest(): FastifyRequest {
  return { id: 'req-err' } as FastifyRequest;
}

function createMockReply() {
  const reply = {
    status: vi.fn(),
    send: vi.fn(),
  };
  reply.status.mockReturnValue(reply);
  reply.send.mockReturnValue(reply);
  return reply;
}

function handle(error: Error) {
  const reply = createMockReply();
  errorHandler(error, createMockRequest(), reply as unknown as FastifyReply);
  return reply;
}

// ============================================================================
// errorHandler Tests
// ============================================================================

describe('errorHandler', () => {
  it('should format zod errors as validation failures', () => {
    const result = z.object({ title: z.string() }).safeParse({ title: 5 });
    if (result.success) throw new Error('expected a parse failure');

    const reply = handle(result.error);

    expect(reply.status).toHaveBeenCalledWith(400);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: {
        issues: [{ field: 'title', message: 'Expected string, received number', code: 'invalid_type' }],
      },
      requestId: 'req-err',
    });
  });

  it('should pass operational errors through', () => {
    const reply = handle(new AppError('Event is fully booked.', 409, true, ErrorCodes.EVENT_FULL));

    expect(reply.status).toHaveBeenCalledWith(409);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Event is fully booked.',
      code: ErrorCodes.EVENT_FULL,
      details: undefined,
      requestId: 'req-err',
    });
  });

  it('should hide the message of non-operational errors', () => {
    const reply = handle(
      new AppError('Failed to register participant', 500, false, ErrorCodes.DATABASE_ERROR, {
        operation: 'register participant',
      })
    );

    expect(reply.status).toHaveBeenCalledWith(500);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Internal server error',
      code: ErrorCodes.DATABASE_ERROR,
      requestId: 'req-err',
    });
  });

  it('should map framework client errors by status', () => {
    const notFound = Object.assign(new Error('Event not found'), { statusCode: 404 });

    const reply = handle(notFound);

    expect(reply.status).toHaveBeenCalledWith(404);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Event not found',
      code: ErrorCodes.NOT_FOUND,
      requestId: 'req-err',
    });
  });

  it('should report rate limiting', () => {
    const limited = Object.assign(new Error('Rate limit exceeded'), { statusCode: 429 });

    const reply = handle(limited);

    expect(reply.status).toHaveBeenCalledWith(429);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Too many requests',
      code: ErrorCodes.RATE_LIMITED,
      requestId: 'req-err',
    });
  });

  it('should hide unknown errors', () => {
    const reply = handle(new Error('boom'));

    expect(reply.status).toHaveBeenCalledWith(500);
    expect(reply.send).toHaveBeenCalledWith({
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
      requestId: 'req-err',
    });
  });
});
