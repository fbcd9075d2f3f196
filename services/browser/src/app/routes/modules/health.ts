import type { FastifyInstance } from 'fastify';

export const registerHealthRoutes = async (app: FastifyInstance) => {
  app.get('/health', {
    schema: {
      description: 'Health check endpoint',
      tags: ['health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['ok'], description: 'Health status' },
            service: { type: 'string', enum: ['browser'], description: 'Service name' },
            snapshot: {
              type: 'object',
              properties: {
                computed_at: { type: ['string', 'null'], format: 'date-time' },
                source: { type: ['string', 'null'] },
                prefixes: { type: 'number' },
                age_seconds: { type: ['number', 'null'] }
              }
            }
          }
        }
      }
    }
  }, async () => {
    const snapshot = app.browserService.snapshot();
    return {
      status: 'ok',
      service: 'browser',
      snapshot: {
        computed_at: snapshot.computedAt,
        source: snapshot.source,
        prefixes: snapshot.prefixes,
        age_seconds: snapshot.ageSeconds
      }
    };
  });
};
