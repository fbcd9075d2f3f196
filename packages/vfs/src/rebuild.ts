import pLimit from "p-limit";
import type { ObjectStoreAdapter } from "@keyspace/storage";
import { aggregate } from "./aggregator";
import { discover } from "./crawler";
import { silentLogger, type VfsLogger } from "./logging";
import { createNoopVfsMetrics, type VfsMetrics } from "./metrics";
import { MetricsSnapshot } from "./snapshot";
import { writeSnapshot } from "./snapshotStore";
import type { DirStats } from "./types";

export const DEFAULT_MAX_DEPTH = 4;
export const DEFAULT_REBUILD_CONCURRENCY = 8;
export const DEFAULT_PROGRESS_EVERY = 10;

export interface RebuildOptions {
  store: ObjectStoreAdapter;
  maxDepth?: number;
  concurrency?: number;
  /** When set, the snapshot is persisted here before the rebuild reports success. */
  snapshotPath?: string;
  pageSize?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  progressEvery?: number;
  logger?: VfsLogger;
  metrics?: VfsMetrics;
  now?: () => Date;
}

export interface RebuildResult {
  snapshot: MetricsSnapshot;
  /** Prefixes whose crawl or aggregation failed; absent from the snapshot. */
  failedPrefixes: string[];
  durationMs: number;
}

export type RebuildOutcome = { status: "skipped" } | ({ status: "completed" } & RebuildResult);

export class RebuildFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RebuildFailedError";
  }
}

type PrefixResult = { prefix: string; ok: true; stats: DirStats } | { prefix: string; ok: false };

/**
 * Crawl, aggregate every discovered prefix and assemble a fresh snapshot.
 * A failing prefix is logged and left out; failing to list the root, or to
 * persist the result, fails the whole run.
 */
export async function rebuildMetrics(options: RebuildOptions): Promise<RebuildResult> {
  const {
    store,
    maxDepth = DEFAULT_MAX_DEPTH,
    concurrency = DEFAULT_REBUILD_CONCURRENCY,
    progressEvery = DEFAULT_PROGRESS_EVERY,
    pageSize,
    timeoutMs,
    signal,
    logger = silentLogger,
    metrics = createNoopVfsMetrics(),
    now = () => new Date(),
  } = options;
  const startedAt = Date.now();

  const crawl = await discover(store, { maxDepth, pageSize, timeoutMs, signal, logger });
  const rootFailure = crawl.failures.find((failure) => failure.prefix === "");
  if (rootFailure) {
    throw new RebuildFailedError("Unable to list the namespace root", { cause: rootFailure.error });
  }
  logger.info({ prefixes: crawl.prefixes.length, source: store.source }, "rebuild_prefixes_discovered");

  const limit = pLimit(Math.max(1, concurrency));
  const total = crawl.prefixes.length;
  let done = 0;

  const results = await Promise.all(
    crawl.prefixes.map((prefix) =>
      limit(async (): Promise<PrefixResult> => {
        let result: PrefixResult;
        try {
          result = { prefix, ok: true, stats: await aggregate(store, prefix, { pageSize, timeoutMs, signal }) };
        } catch (error) {
          if (signal?.aborted) throw error;
          logger.warn({ prefix, err: error }, "rebuild_prefix_failed");
          result = { prefix, ok: false };
        }
        done++;
        if (done % progressEvery === 0 || done === total) {
          logger.info({ done, total }, "rebuild_progress");
        }
        return result;
      })
    )
  );

  const entries: Array<[string, DirStats]> = [];
  const failedPrefixes = crawl.failures.map((failure) => failure.prefix);
  for (const result of results) {
    if (result.ok) entries.push([result.prefix, result.stats]);
    else failedPrefixes.push(result.prefix);
  }
  failedPrefixes.sort();

  const snapshot = new MetricsSnapshot({ computedAt: now(), source: store.source, maxDepth, entries });

  if (options.snapshotPath) {
    try {
      await writeSnapshot(options.snapshotPath, snapshot);
    } catch (error) {
      throw new RebuildFailedError(`Unable to persist metrics snapshot to ${options.snapshotPath}`, { cause: error });
    }
  }

  const durationMs = Date.now() - startedAt;
  metrics.rebuildFailedPrefixes.inc(undefined, failedPrefixes.length);
  logger.info(
    { prefixes: snapshot.size, failed: failedPrefixes.length, durationMs, path: options.snapshotPath },
    "rebuild_completed"
  );
  return { snapshot, failedPrefixes, durationMs };
}

export interface MetricsRebuilder {
  run(): Promise<RebuildOutcome>;
  readonly running: boolean;
}

/** Rebuild runner that skips while a previous run in this process is in flight. */
export function createMetricsRebuilder(options: RebuildOptions): MetricsRebuilder {
  const metrics = options.metrics ?? createNoopVfsMetrics();
  const logger = options.logger ?? silentLogger;
  let inFlight: Promise<RebuildResult> | null = null;

  return {
    get running() {
      return inFlight !== null;
    },

    async run() {
      if (inFlight) {
        metrics.rebuilds.inc({ outcome: "skipped" });
        logger.info({ source: options.store.source }, "rebuild_skipped_in_flight");
        return { status: "skipped" };
      }

      inFlight = rebuildMetrics({ ...options, metrics, logger });
      try {
        const result = await inFlight;
        metrics.rebuilds.inc({ outcome: "completed" });
        metrics.rebuildDurationMs.observe(undefined, result.durationMs);
        return { status: "completed", ...result };
      } catch (error) {
        metrics.rebuilds.inc({ outcome: "failed" });
        throw error;
      } finally {
        inFlight = null;
      }
    },
  };
}
