import { streamObjects, type ListingOptions, type ObjectStoreAdapter } from "@keyspace/storage";
import type { DirStats } from "./types";

export const emptyStats = (): DirStats => ({ size: 0n, count: 0, modified: null });

export function latest(a: Date | null, b: Date | null): Date | null {
  if (!a) return b;
  if (!b) return a;
  return b > a ? b : a;
}

export function mergeStats(into: DirStats, other: DirStats): DirStats {
  return {
    size: into.size + other.size,
    count: into.count + other.count,
    modified: latest(into.modified, other.modified),
  };
}

/**
 * Recursive totals for everything under `prefix` (empty string is the whole
 * namespace). Consumes the flat listing as a stream; listing failures
 * propagate to the caller.
 */
export async function aggregate(
  store: ObjectStoreAdapter,
  prefix: string,
  options: ListingOptions = {}
): Promise<DirStats> {
  let size = 0n;
  let count = 0;
  let modified: Date | null = null;

  for await (const object of streamObjects(store, prefix, options)) {
    size += BigInt(object.size);
    count++;
    modified = latest(modified, object.lastModified);
  }

  return { size, count, modified };
}
