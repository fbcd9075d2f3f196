import { listChildPrefixes, type ObjectStoreAdapter, type StoreCallOptions } from "@keyspace/storage";
import { silentLogger, type VfsLogger } from "./logging";
import { depthOf } from "./paths";

export interface DiscoverOptions extends StoreCallOptions {
  maxDepth: number;
  pageSize?: number;
  logger?: VfsLogger;
}

export interface CrawlFailure {
  prefix: string;
  error: unknown;
}

export interface CrawlResult {
  /** Every discovered prefix (root excluded), sorted. */
  prefixes: string[];
  failures: CrawlFailure[];
}

/**
 * Breadth-first walk of the delimiter hierarchy. Prefixes at `maxDepth` are
 * recorded but not expanded. A failed listing abandons that branch only;
 * aborting the signal stops the walk.
 */
export async function discover(store: ObjectStoreAdapter, options: DiscoverOptions): Promise<CrawlResult> {
  const { maxDepth, pageSize, logger = silentLogger, ...callOptions } = options;
  const found = new Set<string>();
  const failures: CrawlFailure[] = [];
  const queue: string[] = [""];

  for (let head = 0; head < queue.length; head++) {
    const prefix = queue[head];
    if (depthOf(prefix, store.delimiter) >= maxDepth) continue;

    let children: string[];
    try {
      children = await listChildPrefixes(store, prefix, { pageSize, ...callOptions });
    } catch (error) {
      if (callOptions.signal?.aborted) throw error;
      failures.push({ prefix, error });
      logger.warn({ prefix, err: error }, "crawl_prefix_failed");
      continue;
    }

    for (const child of children) {
      if (found.has(child)) continue;
      found.add(child);
      queue.push(child);
    }
  }

  logger.debug({ prefixes: found.size, failures: failures.length }, "crawl_completed");
  return { prefixes: [...found].sort(), failures };
}
