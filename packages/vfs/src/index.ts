export * from "./types";
export { aggregate, emptyStats, mergeStats, latest } from "./aggregator";
export { discover, type CrawlFailure, type CrawlResult, type DiscoverOptions } from "./crawler";
export { formatSize } from "./format";
export { breadcrumbsFor, childName, depthOf, firstSegment, isDirectoryPath, parentOf } from "./paths";
export { MetricsSnapshot, SnapshotFormatError, SNAPSHOT_VERSION, type SnapshotDocument, type SnapshotInit } from "./snapshot";
export { readSnapshot, writeSnapshot, type SnapshotReadResult } from "./snapshotStore";
export {
  MetricsCache,
  type CacheDescription,
  type LoadOutcome,
  type MetricsCacheOptions,
} from "./metricsCache";
export {
  createMetricsRebuilder,
  rebuildMetrics,
  RebuildFailedError,
  DEFAULT_MAX_DEPTH,
  DEFAULT_REBUILD_CONCURRENCY,
  type MetricsRebuilder,
  type RebuildOptions,
  type RebuildOutcome,
  type RebuildResult,
} from "./rebuild";
export {
  buildDirectoryView,
  composeDirectoryView,
  DEFAULT_VIEW_CONCURRENCY,
  type BuildViewOptions,
  type ViewInput,
} from "./viewBuilder";
export {
  classifyPath,
  createPathResolver,
  isJsonObject,
  DEFAULT_RESERVED_SEGMENTS,
  INLINE_MARKER,
  LEGACY_PATH_PARAM,
  type PathResolver,
  type PathResolverOptions,
} from "./resolver";
export { createNoopVfsMetrics, createRecordingVfsMetrics, type VfsMetrics } from "./metrics";
export { silentLogger, type VfsLogger } from "./logging";
