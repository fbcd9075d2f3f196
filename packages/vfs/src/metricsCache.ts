import type { ListingOptions, ObjectStoreAdapter } from "@keyspace/storage";
import { aggregate } from "./aggregator";
import { silentLogger, type VfsLogger } from "./logging";
import { createNoopVfsMetrics, type VfsMetrics } from "./metrics";
import type { MetricsSnapshot } from "./snapshot";
import { readSnapshot } from "./snapshotStore";
import type { DirStats, MissReason, StatsLookup } from "./types";

export interface MetricsCacheOptions {
  store: ObjectStoreAdapter;
  /** Persisted snapshot location; without one the cache only serves live lookups. */
  snapshotPath?: string;
  pageSize?: number;
  logger?: VfsLogger;
  metrics?: VfsMetrics;
  now?: () => Date;
}

/** `foreign`: the file was computed for a different store. */
export type LoadOutcome = "loaded" | "missing" | "corrupt" | "foreign" | "disabled";

export interface CacheDescription {
  loaded: boolean;
  computedAt: string | null;
  source: string | null;
  prefixes: number;
  ageSeconds: number | null;
}

/**
 * Holds at most one snapshot. Reloads swap the reference; a snapshot is never
 * modified after it is installed, so readers need no coordination.
 */
export class MetricsCache {
  private current: MetricsSnapshot | null = null;
  private readonly store: ObjectStoreAdapter;
  private readonly snapshotPath: string | undefined;
  private readonly pageSize: number | undefined;
  private readonly logger: VfsLogger;
  private readonly metrics: VfsMetrics;
  private readonly now: () => Date;

  constructor(options: MetricsCacheOptions) {
    this.store = options.store;
    this.snapshotPath = options.snapshotPath;
    this.pageSize = options.pageSize;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? createNoopVfsMetrics();
    this.now = options.now ?? (() => new Date());
  }

  /** Startup load. An absent, unreadable or foreign file leaves the cache empty. */
  async load(): Promise<LoadOutcome> {
    return this.read(false);
  }

  /** Explicit reload. An absent, unreadable or foreign file keeps the snapshot in effect. */
  async reload(): Promise<LoadOutcome> {
    return this.read(true);
  }

  replace(snapshot: MetricsSnapshot | null): void {
    this.current = snapshot;
  }

  snapshot(): MetricsSnapshot | null {
    return this.current;
  }

  peek(prefix: string): DirStats | undefined {
    return this.current?.get(prefix);
  }

  /** Snapshot entry when present, otherwise a live aggregation. */
  async statsFor(prefix: string, options: Omit<ListingOptions, "pageSize"> = {}): Promise<StatsLookup> {
    const snapshot = this.current;
    const cached = snapshot?.get(prefix);
    if (cached) {
      this.metrics.statsLookups.inc({ source: "snapshot" });
      return { stats: cached, source: "snapshot" };
    }

    const reason: MissReason = !snapshot
      ? "no_snapshot"
      : snapshot.covers(prefix, this.store.delimiter)
        ? "stale"
        : "beyond_depth";
    this.metrics.statsLookups.inc({ source: "live", reason });
    this.logger.debug({ prefix, reason }, "stats_live_fallback");

    const stats = await aggregate(this.store, prefix, { ...options, pageSize: this.pageSize });
    return { stats, source: "live", reason };
  }

  describe(): CacheDescription {
    const snapshot = this.current;
    if (!snapshot) {
      return { loaded: false, computedAt: null, source: null, prefixes: 0, ageSeconds: null };
    }
    return {
      loaded: true,
      computedAt: snapshot.computedAt.toISOString(),
      source: snapshot.source,
      prefixes: snapshot.size,
      ageSeconds: Math.max(0, Math.floor((this.now().getTime() - snapshot.computedAt.getTime()) / 1000)),
    };
  }

  private async read(keepOnFailure: boolean): Promise<LoadOutcome> {
    if (!this.snapshotPath) return "disabled";

    const result = await readSnapshot(this.snapshotPath);
    if (result.status === "loaded" && result.snapshot.source !== this.store.source) {
      this.logger.warn(
        { path: this.snapshotPath, snapshotSource: result.snapshot.source, storeSource: this.store.source },
        "metrics_snapshot_foreign"
      );
      if (!keepOnFailure) this.current = null;
      return "foreign";
    }
    if (result.status === "loaded") {
      this.current = result.snapshot;
      this.logger.info(
        { path: this.snapshotPath, prefixes: result.snapshot.size, computedAt: result.snapshot.computedAt.toISOString() },
        "metrics_snapshot_loaded"
      );
      return "loaded";
    }

    if (result.status === "corrupt") {
      this.logger.warn({ path: this.snapshotPath, err: result.error }, "metrics_snapshot_unreadable");
    } else {
      this.logger.info({ path: this.snapshotPath }, "metrics_snapshot_missing");
    }
    if (!keepOnFailure) this.current = null;
    return result.status;
  }
}
