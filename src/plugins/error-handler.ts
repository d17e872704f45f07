import type { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';

export function registerErrorHandler(app: FastifyInstance) {
  app.setErrorHandler((error: FastifyError | Error, request, reply) => {
    // Zod validation errors
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: 'Validation Error',
        details: error.errors,
      });
    }

    // Custom app errors
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: error.code ?? error.name,
        message: error.message,
      });
    }

    // Fastify validation errors (from schema validation)
    if ('validation' in error && error.validation) {
      return reply.status(400).send({
        error: 'Validation Error',
        details: error.validation,
      });
    }

    // Fallback
    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred.',
    });
  });
}
