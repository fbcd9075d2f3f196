import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { ObjectStoreAdapter } from '@keyspace/storage';
import { createPathResolver, MetricsCache, type LoadOutcome } from '@keyspace/vfs';
import { loadConfig } from '../config';
import { vfsMetrics } from '../observability/metrics';
import { createBrowserService } from '../services/browserService';
import { registerErrorHandler } from './errorHandler';
import { registerMetrics } from './metrics';
import { registerRoutes } from './routes';
import { createObjectStore } from './store';

export interface Server {
  app: FastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
  reloadSnapshot(): Promise<LoadOutcome>;
}

export interface ServerOptions {
  /** Object store to browse; defaults to the one selected by STORAGE_DRIVER. */
  store?: ObjectStoreAdapter;
}

export const createServer = (options: ServerOptions = {}): Server => {
  const config = loadConfig();

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL
    }
  });

  // security headers
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Content-Type-Options', 'nosniff');
    reply.header('X-Frame-Options', 'DENY');
    reply.header('X-XSS-Protection', '0');
    reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  });

  const store = options.store ?? createObjectStore(config, app.log);
  const cache = new MetricsCache({
    store,
    snapshotPath: config.METRICS_SNAPSHOT_PATH,
    logger: app.log,
    metrics: vfsMetrics
  });
  const resolver = createPathResolver({
    store,
    cache,
    reservedSegments: config.RESERVED_SEGMENTS,
    viewConcurrency: config.VIEW_CONCURRENCY,
    logger: app.log,
    metrics: vfsMetrics
  });
  app.decorate(
    'browserService',
    createBrowserService({
      store,
      cache,
      resolver,
      signedUrlTtlSeconds: config.SIGNED_URL_TTL_SECONDS,
      inlineMaxBytes: config.INLINE_MAX_BYTES
    })
  );

  app.addHook('onReady', async () => {
    await cache.load();
  });

  app.addHook('onClose', async () => {
    await store.dispose?.();
  });

  registerMetrics(app, { describeSnapshot: () => app.browserService.snapshot() });
  registerErrorHandler(app);
  app.register(registerRoutes);

  const reloadSnapshot = () => app.browserService.reloadSnapshot();

  // the rebuild job signals HUP once a new snapshot is on disk
  const onHangup = () => {
    reloadSnapshot().catch((error) => {
      app.log.error({ err: error }, 'metrics_snapshot_reload_failed');
    });
  };

  return {
    app,
    reloadSnapshot,
    async start() {
      await store.init({});
      await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
      process.on('SIGHUP', onHangup);
    },
    async stop() {
      process.off('SIGHUP', onHangup);
      await app.close();
    }
  };
};

if (process.argv[1] === new URL(import.meta.url).pathname) {
  const server = createServer();
  server.start().catch((error) => {
    server.app.log.error(error, 'failed to start server');
    process.exitCode = 1;
  });
}
