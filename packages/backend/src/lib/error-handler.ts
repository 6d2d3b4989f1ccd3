import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  InvalidOperationError,
  ConflictError,
  UnauthorizedError,
  ForbiddenError,
} from './errors.js';
import { isUniqueViolation } from './db.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    if (error instanceof InvalidOperationError) {
      response.error = 'Invalid Operation';
      response.message = error.message;
      response.statusCode = 422;
      return reply.status(422).send(response);
    }

    if (error instanceof ConflictError) {
      response.error = 'Conflict';
      response.message = error.message;
      response.statusCode = 409;
      return reply.status(409).send(response);
    }

    if (error instanceof UnauthorizedError) {
      response.error = 'Unauthorized';
      response.message = error.message;
      response.statusCode = 401;
      return reply.status(401).send(response);
    }

    if (error instanceof ForbiddenError) {
      response.error = 'Forbidden';
      response.message = error.message;
      response.statusCode = 403;
      return reply.status(403).send(response);
    }

    if (isUniqueViolation(error)) {
      response.error = 'Conflict';
      response.message = 'Resource already exists';
      response.statusCode = 409;
      return reply.status(409).send(response);
    }

    // Fastify's own errors (malformed JSON, unknown content type, ...)
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      } else {
        response.error = error.name;
      }
      return reply.status(error.statusCode).send(response);
    }

    request.log.error(error);

    return reply.status(500).send(response);
  });
}
