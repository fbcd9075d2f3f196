import type { Counter, Histogram, Labels } from "@keyspace/storage";

export interface VfsMetrics {
  /** Labels: `source` (snapshot | live), `reason` on a miss. */
  statsLookups: Counter;
  /** Labels: `kind`, `reason`. */
  resolutions: Counter;
  /** Labels: `outcome` (completed | skipped | failed). */
  rebuilds: Counter;
  rebuildDurationMs: Histogram;
  rebuildFailedPrefixes: Counter;
}

export function createNoopVfsMetrics(): VfsMetrics {
  const counter: Counter = { inc: () => undefined };
  const histogram: Histogram = { observe: () => undefined };
  return {
    statsLookups: counter,
    resolutions: counter,
    rebuilds: counter,
    rebuildDurationMs: histogram,
    rebuildFailedPrefixes: counter,
  };
}

type Recorded = Array<{ labels?: Labels; value?: number }>;

/** Records every call so tests can assert on labels. */
export function createRecordingVfsMetrics() {
  const calls: Record<keyof VfsMetrics, Recorded> = {
    statsLookups: [],
    resolutions: [],
    rebuilds: [],
    rebuildDurationMs: [],
    rebuildFailedPrefixes: [],
  };
  const counter = (name: keyof VfsMetrics): Counter => ({
    inc: (labels, value) => void calls[name].push({ labels, value }),
  });

  const metrics: VfsMetrics = {
    statsLookups: counter("statsLookups"),
    resolutions: counter("resolutions"),
    rebuilds: counter("rebuilds"),
    rebuildDurationMs: { observe: (labels, value) => void calls.rebuildDurationMs.push({ labels, value }) },
    rebuildFailedPrefixes: counter("rebuildFailedPrefixes"),
  };
  return { metrics, calls };
}
