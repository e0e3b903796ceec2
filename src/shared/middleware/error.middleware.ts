import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '@shared/errors/app-error.js';
import { formatZodError } from '@shared/errors/zod-error-formatter.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

const CLIENT_ERROR_CODES: Record<number, string> = {
  400: ErrorCodes.BAD_REQUEST,
  401: ErrorCodes.UNAUTHORIZED,
  403: ErrorCodes.FORBIDDEN,
  404: ErrorCodes.NOT_FOUND,
  409: ErrorCodes.CONFLICT,
};

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  // Zod validation error
  if (error instanceof ZodError) {
    return reply.status(400).send(formatZodError(error).toResponse(requestId));
  }

  // Known error
  if (error instanceof AppError) {
    if (error.isOperational) {
      logger.warn({ err: error, requestId }, error.message);
    } else {
      logger.error({ err: error, requestId }, error.message);
    }
    return reply.status(error.statusCode).send(error.toResponse(requestId));
  }

  // Schema validation from the type provider
  if ('validation' in error && error.validation) {
    return reply.status(400).send({
      error: 'Validation failed',
      code: ErrorCodes.VALIDATION_ERROR,
      details: { issues: error.validation },
      requestId,
    });
  }

  // Rate limit error
  if ('statusCode' in error && error.statusCode === 429) {
    return reply.status(429).send({
      error: 'Too many requests',
      code: ErrorCodes.RATE_LIMITED,
      requestId,
    });
  }

  // Other client errors (httpErrors, malformed bodies)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.status(error.statusCode).send({
      error: error.message,
      code: CLIENT_ERROR_CODES[error.statusCode] ?? ErrorCodes.BAD_REQUEST,
      requestId,
    });
  }

  // Unknown error
  logger.error({ err: error, requestId }, 'Unhandled error');
  return reply.status(500).send({
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
  });
}
