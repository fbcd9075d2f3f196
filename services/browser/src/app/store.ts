import type { BaseLogger } from 'pino';
import {
  createPinoStorageLogger,
  InMemoryObjectStoreAdapter,
  parseS3AdapterConfig,
  S3ObjectStoreAdapter,
  type ObjectStoreAdapter
} from '@keyspace/storage';
import type { Config } from '../config';
import { storageMetrics } from '../observability/metrics';

export const createObjectStore = (config: Config, logger: BaseLogger): ObjectStoreAdapter => {
  if (config.STORAGE_DRIVER === 'memory') {
    return new InMemoryObjectStoreAdapter({ name: 'local' });
  }

  const s3 = parseS3AdapterConfig({
    bucket: config.S3_BUCKET,
    region: config.S3_REGION,
    endpoint: config.S3_ENDPOINT,
    forcePathStyle: config.S3_FORCE_PATH_STYLE,
    timeoutMs: config.STORE_TIMEOUT_MS,
    retryAttempts: config.STORE_RETRY_ATTEMPTS
  });
  return new S3ObjectStoreAdapter({
    ...s3,
    logger: createPinoStorageLogger(logger),
    metrics: storageMetrics
  });
};
