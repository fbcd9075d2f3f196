import { randomUUID } from "node:crypto";
import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { MetricsSnapshot } from "./snapshot";

export type SnapshotReadResult =
  | { status: "loaded"; snapshot: MetricsSnapshot }
  | { status: "missing" }
  | { status: "corrupt"; error: unknown };

/**
 * Writes the snapshot beside `path` under a unique temporary name, flushes it
 * and renames it over `path`. Readers see either the old file or the new one.
 */
export async function writeSnapshot(path: string, snapshot: MetricsSnapshot): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
  const content = `${JSON.stringify(snapshot.toDocument(), null, 2)}\n`;

  try {
    const handle = await open(tempPath, "w", 0o644);
    try {
      await handle.writeFile(content, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function readSnapshot(path: string): Promise<SnapshotReadResult> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return { status: "missing" };
    return { status: "corrupt", error };
  }

  try {
    return { status: "loaded", snapshot: MetricsSnapshot.fromDocument(JSON.parse(raw)) };
  } catch (error) {
    return { status: "corrupt", error };
  }
}

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
