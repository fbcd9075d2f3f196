import type { ServerResponse } from 'node:http';
import type { FastifyInstance } from 'fastify';
import { INLINE_MARKER, type QueryParams } from '@keyspace/vfs';
import { encodeKeyPath } from '../../../services/browserService';

interface WildcardRoute {
  Params: { '*': string };
  Querystring: QueryParams;
}

interface BrowseRoute {
  Params: { '*'?: string };
  Querystring: QueryParams;
}

/** Aborts the request's store calls if the client goes away before the reply is written. */
export const abortOnDisconnect = (response: ServerResponse): AbortSignal => {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) controller.abort();
  });
  return controller.signal;
};

export const registerBrowseRoutes = async (app: FastifyInstance) => {
  // legacy links from the server-rendered listing
  app.get<WildcardRoute>('/view/*', async (request, reply) =>
    reply.redirect(301, `${encodeKeyPath(request.params['*'])}?${INLINE_MARKER}`)
  );

  app.get<WildcardRoute>('/download/*', async (request, reply) => reply.redirect(301, encodeKeyPath(request.params['*'])));

  for (const url of ['/', '/*']) {
    app.get<BrowseRoute>(url, async (request, reply) => {
      const path = request.params['*'] ?? '';
      const result = await app.browserService.browse(path, request.query, { signal: abortOnDisconnect(reply.raw) });

      switch (result.type) {
        case 'not_found':
          return reply.code(404).send({ error: 'NOT_FOUND', message: 'not found' });
        case 'redirect':
          return reply.redirect(result.statusCode, result.location);
        default:
          return reply.send(result.body);
      }
    });
  }
};
