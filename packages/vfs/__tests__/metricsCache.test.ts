import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, expect, vi } from "vitest";
import { MetricsCache } from "../src/metricsCache";
import { createRecordingVfsMetrics } from "../src/metrics";
import { MetricsSnapshot } from "../src/snapshot";
import { writeSnapshot } from "../src/snapshotStore";
import { captureLogger, fixtureStore, flushLogs, withTempDir } from "./support";

const computedAt = new Date("2024-06-01T00:00:00.000Z");

const planted = () =>
  new MetricsSnapshot({
    computedAt,
    source: "memory://fixture",
    maxDepth: 4,
    // deliberately different from the store so hits are recognisable
    entries: [["a/", { size: 999n, count: 99, modified: null }]],
  });

describe("MetricsCache", () => {
  it("falls back to live aggregation without a snapshot", async () => {
    const { metrics, calls } = createRecordingVfsMetrics();
    const cache = new MetricsCache({ store: fixtureStore(), metrics });

    await expect(cache.load()).resolves.toBe("disabled");
    const lookup = await cache.statsFor("a/b/c/");

    expect(lookup).toEqual({
      stats: { size: 120n, count: 3, modified: new Date("2024-05-01T00:00:00.000Z") },
      source: "live",
      reason: "no_snapshot",
    });
    expect(calls.statsLookups).toEqual([{ labels: { source: "live", reason: "no_snapshot" }, value: undefined }]);
  });

  it("serves snapshot entries without touching the store", async () => {
    const store = fixtureStore();
    const spy = vi.spyOn(store, "listRecursivePage");
    const cache = new MetricsCache({ store });
    cache.replace(planted());

    await expect(cache.statsFor("a/")).resolves.toEqual({
      stats: { size: 999n, count: 99, modified: null },
      source: "snapshot",
    });
    expect(cache.peek("a/")).toEqual({ size: 999n, count: 99, modified: null });
    expect(spy).not.toHaveBeenCalled();
  });

  it("labels misses as stale or beyond the crawl depth", async () => {
    const cache = new MetricsCache({ store: fixtureStore() });
    cache.replace(planted());

    await expect(cache.statsFor("docs/")).resolves.toMatchObject({ source: "live", reason: "stale" });
    await expect(cache.statsFor("a/b/c/d/e/")).resolves.toEqual({
      stats: { size: 50n, count: 1, modified: new Date("2024-05-01T00:00:00.000Z") },
      source: "live",
      reason: "beyond_depth",
    });
    expect(cache.peek("docs/")).toBeUndefined();
  });

  it("keeps serving the snapshot a reader already holds after a swap", () => {
    const cache = new MetricsCache({ store: fixtureStore() });
    const first = planted();
    cache.replace(first);
    const held = cache.snapshot();

    cache.replace(new MetricsSnapshot({ computedAt, source: "memory://fixture", entries: [] }));

    expect(held?.get("a/")).toEqual({ size: 999n, count: 99, modified: null });
    expect(cache.peek("a/")).toBeUndefined();
  });

  it("loads the persisted snapshot and describes it", async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, "metrics.json");
      await writeSnapshot(snapshotPath, planted());
      const cache = new MetricsCache({
        store: fixtureStore(),
        snapshotPath,
        now: () => new Date("2024-06-01T00:01:30.000Z"),
      });

      await expect(cache.load()).resolves.toBe("loaded");
      expect(cache.describe()).toEqual({
        loaded: true,
        computedAt: "2024-06-01T00:00:00.000Z",
        source: "memory://fixture",
        prefixes: 1,
        ageSeconds: 90,
      });
    });
  });

  it("keeps the current snapshot when a reload finds a bad file", async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, "metrics.json");
      await writeSnapshot(snapshotPath, planted());
      const cache = new MetricsCache({ store: fixtureStore(), snapshotPath });
      await cache.load();
      const before = cache.snapshot();

      await writeFile(snapshotPath, "truncated{");
      await expect(cache.reload()).resolves.toBe("corrupt");
      expect(cache.snapshot()).toBe(before);

      await expect(cache.load()).resolves.toBe("corrupt");
      expect(cache.snapshot()).toBeNull();
    });
  });

  it("rejects a snapshot computed for another store", async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, "metrics.json");
      const { logger, lines } = captureLogger();
      const cache = new MetricsCache({ store: fixtureStore(), snapshotPath, logger });
      await writeSnapshot(snapshotPath, planted());
      await cache.load();
      const before = cache.snapshot();

      await writeSnapshot(
        snapshotPath,
        new MetricsSnapshot({ computedAt, source: "s3://other-bucket", entries: [["a/", { size: 1n, count: 1, modified: null }]] })
      );
      await expect(cache.reload()).resolves.toBe("foreign");
      expect(cache.snapshot()).toBe(before);

      await expect(cache.load()).resolves.toBe("foreign");
      expect(cache.snapshot()).toBeNull();
      await flushLogs();
      expect(lines.find((line) => line.msg === "metrics_snapshot_foreign")).toMatchObject({
        level: 40,
        snapshotSource: "s3://other-bucket",
        storeSource: "memory://fixture",
      });
    });
  });

  it("starts empty when the snapshot file is missing", async () => {
    await withTempDir(async (dir) => {
      const cache = new MetricsCache({ store: fixtureStore(), snapshotPath: join(dir, "none.json") });

      await expect(cache.load()).resolves.toBe("missing");
      expect(cache.describe()).toEqual({ loaded: false, computedAt: null, source: null, prefixes: 0, ageSeconds: null });
    });
  });
});
