export * from "./types";
export * from "./errors";
export type { AdapterInitOptions, ObjectStoreAdapter } from "./adapters/base";
export { S3ObjectStoreAdapter, type S3AdapterOptions } from "./adapters/s3";
export { InMemoryObjectStoreAdapter, type MemoryAdapterOptions, type MemoryObjectInput } from "./adapters/memory";
export { listChildren, listChildPrefixes, streamObjects, hasEntriesUnder, type ListingOptions } from "./listing";
export { parseS3AdapterConfig, type S3AdapterConfig } from "./config/schema";
export {
  createNoopStorageLogger,
  createPinoStorageLogger,
  isStorageLogger,
  type StorageLogFields,
  type StorageLogger,
} from "./observability/logs";
export {
  createNoopStorageMetrics,
  createRecordingStorageMetrics,
  type Counter,
  type Histogram,
  type Labels,
  type RecordedCall,
  type StorageMetrics,
} from "./observability/metrics";
export { retry, type RetryOptions } from "./utils/retry";
export { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from "./utils/circuitBreaker";
