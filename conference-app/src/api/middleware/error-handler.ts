import type { FastifyInstance } from 'fastify';
import {
  ArgumentError,
  EntityNotFoundError,
  NonUniqueResultError,
  ParseError,
  UnsupportedExpressionError,
} from '../../../../src/index.js';

function statusCodeOf(error: Error): number | undefined {
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Bad expression text in a query string or body → 400 with the offending offset
    if (error instanceof ParseError) {
      return reply.status(400).send({ error: error.name, message: error.message, position: error.position });
    }

    if (error instanceof ArgumentError || error instanceof UnsupportedExpressionError) {
      return reply.status(400).send({ error: error.name, message: error.message });
    }

    if (error instanceof EntityNotFoundError) {
      return reply.status(404).send({ error: error.name, message: error.message });
    }

    if (error instanceof NonUniqueResultError) {
      return reply.status(409).send({ error: error.name, message: error.message });
    }

    // Fastify built-in errors (validation, content type) carry their own status
    const statusCode = statusCodeOf(error);
    if (statusCode !== undefined) {
      return reply.status(statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
