import { Writable } from "node:stream";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { InMemoryObjectStoreAdapter } from "@keyspace/storage";

export const fixtureObjects: Array<[key: string, size: number, modified: string]> = [
  ["a/1.txt", 10, "2024-01-01T00:00:00.000Z"],
  ["a/b/2.txt", 20, "2024-02-01T00:00:00.000Z"],
  ["a/b/c/3.txt", 30, "2024-03-01T00:00:00.000Z"],
  ["a/b/c/d/4.txt", 40, "2024-04-01T00:00:00.000Z"],
  ["a/b/c/d/e/5.txt", 50, "2024-05-01T00:00:00.000Z"],
  ["docs/readme.md", 5, "2024-01-15T00:00:00.000Z"],
  ["top.json", 7, "2023-12-31T00:00:00.000Z"],
];

export function fixtureStore(pageSize?: number): InMemoryObjectStoreAdapter {
  const store = new InMemoryObjectStoreAdapter({ name: "fixture", pageSize });
  for (const [key, size, modified] of fixtureObjects) {
    store.put(key, { size, lastModified: new Date(modified) });
  }
  return store;
}

export function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString()));
      callback();
    },
  });
  const logger = pino({ level: "debug" }, destination);
  const messages = () => lines.map((line) => line.msg);
  return { lines, logger, messages };
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "keyspace-vfs-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export const flushLogs = () => new Promise((resolve) => setImmediate(resolve));
