import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { describe, it, expect, vi } from "vitest";
import { TransientAdapterError } from "@keyspace/storage";
import { createRecordingVfsMetrics } from "../src/metrics";
import { createMetricsRebuilder, rebuildMetrics, RebuildFailedError } from "../src/rebuild";
import { readSnapshot } from "../src/snapshotStore";
import { captureLogger, fixtureStore, flushLogs, withTempDir } from "./support";

const now = () => new Date("2024-06-01T00:00:00.000Z");

describe("rebuildMetrics", () => {
  it("aggregates every discovered prefix", async () => {
    const { snapshot, failedPrefixes } = await rebuildMetrics({ store: fixtureStore(), maxDepth: 4, now });

    expect(failedPrefixes).toEqual([]);
    expect(snapshot.source).toBe("memory://fixture");
    expect(snapshot.computedAt).toEqual(now());
    expect(snapshot.maxDepth).toBe(4);
    expect(snapshot.prefixes()).toEqual(["a/", "a/b/", "a/b/c/", "a/b/c/d/", "docs/"]);
    expect(snapshot.get("a/")).toEqual({ size: 150n, count: 5, modified: new Date("2024-05-01T00:00:00.000Z") });
    expect(snapshot.get("docs/")).toEqual({ size: 5n, count: 1, modified: new Date("2024-01-15T00:00:00.000Z") });
  });

  it("is idempotent when the store does not change", async () => {
    const store = fixtureStore(2);
    const first = await rebuildMetrics({ store, concurrency: 3 });
    const second = await rebuildMetrics({ store, concurrency: 1 });

    expect(second.snapshot.prefixes()).toEqual(first.snapshot.prefixes());
    for (const prefix of first.snapshot.prefixes()) {
      expect(second.snapshot.get(prefix)).toEqual(first.snapshot.get(prefix));
    }
  });

  it("omits prefixes whose aggregation fails", async () => {
    const store = fixtureStore();
    const list = store.listRecursivePage.bind(store);
    vi.spyOn(store, "listRecursivePage").mockImplementation(async (query, options) => {
      if (query.prefix === "a/b/") throw new TransientAdapterError("listing failed");
      return list(query, options);
    });
    const { metrics, calls } = createRecordingVfsMetrics();

    const { snapshot, failedPrefixes } = await rebuildMetrics({ store, metrics });

    expect(failedPrefixes).toEqual(["a/b/"]);
    expect(snapshot.has("a/b/")).toBe(false);
    expect(snapshot.prefixes()).toEqual(["a/", "a/b/c/", "a/b/c/d/", "docs/"]);
    expect(calls.rebuildFailedPrefixes).toEqual([{ labels: undefined, value: 1 }]);
  });

  it("fails as a whole when the root cannot be listed", async () => {
    const store = fixtureStore();
    vi.spyOn(store, "listChildrenPage").mockRejectedValue(new TransientAdapterError("bucket unreachable"));

    await expect(rebuildMetrics({ store })).rejects.toBeInstanceOf(RebuildFailedError);
  });

  it("persists the snapshot atomically", async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, "metrics.json");
      await rebuildMetrics({ store: fixtureStore(), snapshotPath, now });

      const result = await readSnapshot(snapshotPath);
      expect(result.status === "loaded" && result.snapshot.get("a/b/c/d/")).toEqual({
        size: 90n,
        count: 2,
        modified: new Date("2024-05-01T00:00:00.000Z"),
      });
    });
  });

  it("fails when the snapshot cannot be written", async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, "metrics.json");
      await mkdir(join(snapshotPath, "occupied"), { recursive: true });

      await expect(rebuildMetrics({ store: fixtureStore(), snapshotPath })).rejects.toBeInstanceOf(RebuildFailedError);
    });
  });

  it("logs progress every N prefixes", async () => {
    const { logger, lines } = captureLogger();

    await rebuildMetrics({ store: fixtureStore(), progressEvery: 2, logger });
    await flushLogs();

    const progress = lines.filter((line) => line.msg === "rebuild_progress").map((line) => line.done);
    expect(progress).toEqual([2, 4, 5]);
  });
});

describe("createMetricsRebuilder", () => {
  it("skips a run while another is in flight", async () => {
    const { metrics, calls } = createRecordingVfsMetrics();
    const rebuilder = createMetricsRebuilder({ store: fixtureStore(), metrics });

    const first = rebuilder.run();
    expect(rebuilder.running).toBe(true);
    await expect(rebuilder.run()).resolves.toEqual({ status: "skipped" });

    const outcome = await first;
    expect(outcome.status).toBe("completed");
    expect(rebuilder.running).toBe(false);
    expect(calls.rebuilds.map((call) => call.labels?.outcome)).toEqual(["skipped", "completed"]);
  });

  it("records failed runs and allows the next one", async () => {
    const store = fixtureStore();
    const failing = vi.spyOn(store, "listChildrenPage").mockRejectedValueOnce(new TransientAdapterError("down"));
    const { metrics, calls } = createRecordingVfsMetrics();
    const rebuilder = createMetricsRebuilder({ store, metrics });

    await expect(rebuilder.run()).rejects.toBeInstanceOf(RebuildFailedError);
    failing.mockRestore();
    await expect(rebuilder.run()).resolves.toMatchObject({ status: "completed" });
    expect(calls.rebuilds.map((call) => call.labels?.outcome)).toEqual(["failed", "completed"]);
  });
});
