import { z } from "zod";
import { formatSize } from "./format";
import { depthOf } from "./paths";
import type { DirStats } from "./types";

export const SNAPSHOT_VERSION = 1;

const EntrySchema = z.object({
  size: z.string().regex(/^\d+$/, "size must be a decimal byte count"),
  size_display: z.string().optional(),
  file_count: z.number().int().positive(),
  modified: z.string().datetime({ offset: true }).nullable(),
});

const DocumentSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  computed_at: z.string().datetime({ offset: true }),
  source: z.string(),
  max_depth: z.number().int().nonnegative().optional(),
  folder_count: z.number().int().nonnegative(),
  metrics: z.record(EntrySchema),
});

export type SnapshotDocument = z.infer<typeof DocumentSchema>;

export class SnapshotFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotFormatError";
  }
}

export interface SnapshotInit {
  computedAt: Date;
  source: string;
  /** Crawl depth the snapshot was built with; deeper prefixes are never present. */
  maxDepth?: number;
  entries: Iterable<readonly [string, DirStats]>;
}

/**
 * Immutable prefix → DirStats mapping. Entries with no objects are dropped so
 * that absence always means "not cached".
 */
export class MetricsSnapshot {
  readonly computedAt: Date;
  readonly source: string;
  readonly maxDepth: number | undefined;
  private readonly entries: ReadonlyMap<string, Readonly<DirStats>>;

  constructor(init: SnapshotInit) {
    this.computedAt = new Date(init.computedAt.getTime());
    this.source = init.source;
    this.maxDepth = init.maxDepth;

    const entries = new Map<string, Readonly<DirStats>>();
    for (const [prefix, stats] of init.entries) {
      if (stats.count === 0) continue;
      entries.set(
        prefix,
        Object.freeze({
          size: stats.size,
          count: stats.count,
          modified: stats.modified ? new Date(stats.modified.getTime()) : null,
        })
      );
    }
    this.entries = entries;
    Object.freeze(this);
  }

  get size(): number {
    return this.entries.size;
  }

  get(prefix: string): DirStats | undefined {
    const stats = this.entries.get(prefix);
    // Date is mutable; hand out copies
    return stats ? { ...stats, modified: stats.modified ? new Date(stats.modified.getTime()) : null } : undefined;
  }

  has(prefix: string): boolean {
    return this.entries.has(prefix);
  }

  prefixes(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** True when `prefix` is shallow enough to have been crawled. */
  covers(prefix: string, delimiter?: string): boolean {
    return this.maxDepth === undefined || depthOf(prefix, delimiter) <= this.maxDepth;
  }

  toDocument(): SnapshotDocument {
    const metrics: SnapshotDocument["metrics"] = {};
    for (const prefix of this.prefixes()) {
      const stats = this.entries.get(prefix);
      if (!stats) continue;
      metrics[prefix] = {
        size: stats.size.toString(),
        size_display: formatSize(stats.size),
        file_count: stats.count,
        modified: stats.modified ? stats.modified.toISOString() : null,
      };
    }
    return {
      version: SNAPSHOT_VERSION,
      computed_at: this.computedAt.toISOString(),
      source: this.source,
      ...(this.maxDepth === undefined ? {} : { max_depth: this.maxDepth }),
      folder_count: this.entries.size,
      metrics,
    };
  }

  static fromDocument(input: unknown): MetricsSnapshot {
    const parsed = DocumentSchema.safeParse(input);
    if (!parsed.success) {
      throw new SnapshotFormatError(`Invalid metrics snapshot: ${parsed.error.message}`, { cause: parsed.error });
    }
    const document = parsed.data;
    return new MetricsSnapshot({
      computedAt: new Date(document.computed_at),
      source: document.source,
      maxDepth: document.max_depth,
      entries: Object.entries(document.metrics).map(
        ([prefix, entry]) =>
          [
            prefix,
            {
              size: BigInt(entry.size),
              count: entry.file_count,
              modified: entry.modified === null ? null : new Date(entry.modified),
            },
          ] as const
      ),
    });
  }
}
