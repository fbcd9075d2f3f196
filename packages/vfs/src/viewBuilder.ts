import pLimit from "p-limit";
import {
  listChildren,
  type ChildListing,
  type ObjectStoreAdapter,
  type StoreCallOptions,
} from "@keyspace/storage";
import { formatSize } from "./format";
import type { MetricsCache } from "./metricsCache";
import { breadcrumbsFor, childName, parentOf } from "./paths";
import type { DirectoryEntry, DirectoryView, FileEntry, StatsLookup } from "./types";

export const DEFAULT_VIEW_CONCURRENCY = 8;

export interface ViewInput {
  prefix: string;
  delimiter: string;
  listing: ChildListing;
  /** Stats per child prefix; prefixes missing here are dropped from the view. */
  childStats: ReadonlyMap<string, StatsLookup>;
}

const byName = (a: { name: string }, b: { name: string }): number => {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left !== right) return left < right ? -1 : 1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
};

/**
 * One directory level from a delimiter listing plus per-child stats. Totals
 * are the sum of child stats and direct file sizes; nothing is re-walked.
 */
export function composeDirectoryView(input: ViewInput): DirectoryView {
  const { prefix, delimiter, listing, childStats } = input;

  const directories: DirectoryEntry[] = [];
  for (const child of listing.prefixes) {
    const lookup = childStats.get(child);
    if (!lookup) continue;
    directories.push({
      name: childName(prefix, child, delimiter),
      prefix: child,
      size: lookup.stats.size,
      sizeDisplay: formatSize(lookup.stats.size),
      count: lookup.stats.count,
      modified: lookup.stats.modified,
      source: lookup.source,
    });
  }

  const files: FileEntry[] = [];
  for (const object of listing.objects) {
    const name = object.key.slice(prefix.length);
    // the folder marker itself, or a key the delimiter listing should have grouped
    if (name === "" || name.includes(delimiter)) continue;
    files.push({
      name,
      key: object.key,
      size: object.size,
      sizeDisplay: formatSize(object.size),
      modified: object.lastModified,
    });
  }

  directories.sort(byName);
  files.sort(byName);

  let totalSize = 0n;
  let totalCount = 0;
  for (const directory of directories) {
    totalSize += directory.size;
    totalCount += directory.count;
  }
  for (const file of files) {
    totalSize += BigInt(file.size);
    totalCount++;
  }

  return {
    prefix,
    parent: parentOf(prefix, delimiter),
    breadcrumbs: breadcrumbsFor(prefix, delimiter),
    directories,
    files,
    totalSize,
    totalSizeDisplay: formatSize(totalSize),
    totalCount,
    directoryCount: directories.length,
    fileCount: files.length,
  };
}

export interface BuildViewOptions extends StoreCallOptions {
  concurrency?: number;
  pageSize?: number;
}

/** Lists one level under `prefix` and joins each child directory with its cached stats. */
export async function buildDirectoryView(
  store: ObjectStoreAdapter,
  cache: MetricsCache,
  prefix: string,
  options: BuildViewOptions = {}
): Promise<DirectoryView> {
  const { concurrency = DEFAULT_VIEW_CONCURRENCY, pageSize, ...callOptions } = options;
  const listing = await listChildren(store, prefix, { pageSize, ...callOptions });

  const limit = pLimit(Math.max(1, concurrency));
  const lookups = await Promise.all(
    listing.prefixes.map((child) =>
      limit(async () => [child, await cache.statsFor(child, callOptions)] as const)
    )
  );

  return composeDirectoryView({
    prefix,
    delimiter: store.delimiter,
    listing,
    childStats: new Map(lookups),
  });
}
