import type { FastifyInstance } from 'fastify';
import { register } from 'prom-client';
import type { CacheDescription } from '@keyspace/vfs';
import {
  requestDurationHistogram,
  requestTotalCounter,
  snapshotAgeGauge,
  snapshotLoadedGauge,
  snapshotPrefixesGauge
} from '../observability/metrics';

export interface MetricsRouteOptions {
  /** Read at scrape time to publish snapshot freshness. */
  describeSnapshot?: () => CacheDescription;
}

export const registerMetrics = (app: FastifyInstance, options: MetricsRouteOptions = {}) => {
  app.addHook('onRequest', async (request) => {
    request.metrics = {
      startTime: process.hrtime.bigint()
    };
  });

  app.addHook('onResponse', async (request, reply) => {
    // browse paths are unbounded; label by route pattern
    const route = request.routeOptions.url ?? 'unmatched';
    if (route === '/metrics') return;
    requestTotalCounter.labels({ route, method: request.method }).inc();

    if (request.metrics) {
      const duration = Number(process.hrtime.bigint() - request.metrics.startTime) / 1_000_000;
      requestDurationHistogram.labels({ route, method: request.method, status_code: String(reply.statusCode) }).observe(duration);
    }
  });

  app.get('/metrics', async (request, reply) => {
    if (process.env.NODE_ENV === 'production') {
      return reply.status(404).send();
    }
    if (options.describeSnapshot) {
      const snapshot = options.describeSnapshot();
      snapshotLoadedGauge.set(snapshot.loaded ? 1 : 0);
      snapshotAgeGauge.set(snapshot.ageSeconds ?? 0);
      snapshotPrefixesGauge.set(snapshot.prefixes);
    }
    reply.type('text/plain');
    return register.metrics();
  });
};

declare module 'fastify' {
  interface FastifyRequest {
    metrics?: {
      startTime: bigint;
    };
  }
}
