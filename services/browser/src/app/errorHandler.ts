import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { isStorageError } from '@keyspace/storage';

const UNAVAILABLE_CODES = new Set(['TIMEOUT', 'TRANSIENT_ADAPTER_ERROR', 'CIRCUIT_OPEN']);

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      reply.status(400).send({ error: 'BAD_REQUEST', message: 'invalid request', details: error.validation });
      return;
    }

    if (error instanceof ZodError) {
      reply.status(400).send({ error: 'BAD_REQUEST', message: 'invalid request', details: error.issues });
      return;
    }

    if (error.statusCode === 404) {
      reply.status(404).send({ error: 'NOT_FOUND', message: 'not found' });
      return;
    }

    if (isStorageError(error)) {
      if (error.code === 'NOT_FOUND') {
        reply.status(404).send({ error: 'NOT_FOUND', message: 'not found' });
        return;
      }
      if (error.code === 'ABORTED') {
        request.log.info({ code: error.code }, 'request_aborted');
        reply.status(499).send({ error: 'CLIENT_CLOSED', message: 'request aborted' });
        return;
      }
      if (UNAVAILABLE_CODES.has(error.code)) {
        request.log.warn({ err: error, code: error.code }, 'store_unavailable');
        reply.status(503).send({ error: 'STORE_UNAVAILABLE', message: 'storage temporarily unavailable' });
        return;
      }
      request.log.error({ err: error, code: error.code }, 'store_error');
      reply.status(502).send({ error: 'STORE_ERROR', message: 'storage request failed' });
      return;
    }

    request.log.error({ err: error }, 'unhandled error');
    reply.status(500).send({ error: 'INTERNAL', message: 'internal server error' });
  });
};
