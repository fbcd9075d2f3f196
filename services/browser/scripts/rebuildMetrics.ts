import type { BaseLogger } from 'pino';
import type { ObjectStoreAdapter } from '@keyspace/storage';
import { createMetricsRebuilder, type RebuildOutcome } from '@keyspace/vfs';
import { createObjectStore } from '../src/app/store';
import { loadConfig } from '../src/config';
import { createLogger } from '../src/observability/logging';
import { vfsMetrics } from '../src/observability/metrics';

export const rebuild = async (store?: ObjectStoreAdapter, logger?: BaseLogger): Promise<RebuildOutcome> => {
  const config = loadConfig();
  const log = logger ?? createLogger(config.LOG_LEVEL);
  const target = store ?? createObjectStore(config, log);

  try {
    await target.init();
    const rebuilder = createMetricsRebuilder({
      store: target,
      maxDepth: config.CRAWL_MAX_DEPTH,
      concurrency: config.REBUILD_CONCURRENCY,
      snapshotPath: config.METRICS_SNAPSHOT_PATH,
      timeoutMs: config.STORE_TIMEOUT_MS,
      logger: log,
      metrics: vfsMetrics
    });
    return await rebuilder.run();
  } finally {
    if (!store) await target.dispose?.();
  }
};

/** Exit code for one rebuild run: 0 on success or skip, 1 on failure. */
export const runRebuildScript = async (store?: ObjectStoreAdapter, logger?: BaseLogger): Promise<number> => {
  const log = logger ?? createLogger(loadConfig().LOG_LEVEL);
  try {
    await rebuild(store, log);
    return 0;
  } catch (error) {
    log.error({ err: error }, 'metrics_rebuild_failed');
    return 1;
  }
};

if (process.argv[1] === new URL(import.meta.url).pathname) {
  process.exitCode = await runRebuildScript();
}
