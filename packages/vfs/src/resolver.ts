import { hasEntriesUnder, type ObjectProbe, type ObjectStoreAdapter, type StoreCallOptions } from "@keyspace/storage";
import { silentLogger, type VfsLogger } from "./logging";
import type { MetricsCache } from "./metricsCache";
import { createNoopVfsMetrics, type VfsMetrics } from "./metrics";
import { firstSegment, isDirectoryPath } from "./paths";
import type { PathClassification, QueryParams, ResolveRequest, ResolvedState } from "./types";
import { buildDirectoryView } from "./viewBuilder";

export const DEFAULT_RESERVED_SEGMENTS = ["health", "metrics", "view", "download", "public", "docs", "api"] as const;
export const LEGACY_PATH_PARAM = "path";
export const INLINE_MARKER = "view";

export function isJsonObject(meta: Pick<ObjectProbe, "key" | "contentType">): boolean {
  const mediaType = meta.contentType?.split(";")[0]?.trim().toLowerCase();
  if (mediaType === "application/json" || mediaType?.endsWith("+json")) return true;
  return meta.key.toLowerCase().endsWith(".json");
}

/**
 * Decides what `path` denotes. A trailing delimiter means a directory; otherwise
 * an exact key wins over a prefix of the same name.
 */
export async function classifyPath(
  store: ObjectStoreAdapter,
  path: string,
  options: StoreCallOptions = {}
): Promise<PathClassification> {
  if (isDirectoryPath(path, store.delimiter)) return { state: "IS_DIR" };

  const meta = await store.probeObject(path, options);
  if (meta) return { state: "IS_FILE", meta };

  const canonical = path + store.delimiter;
  if (await hasEntriesUnder(store, canonical, options)) {
    return { state: "IS_DIR_NO_SLASH", canonical };
  }
  return { state: "NOT_FOUND" };
}

export interface PathResolverOptions {
  store: ObjectStoreAdapter;
  cache: MetricsCache;
  reservedSegments?: Iterable<string>;
  viewConcurrency?: number;
  pageSize?: number;
  logger?: VfsLogger;
  metrics?: VfsMetrics;
}

export interface PathResolver {
  resolve(request: ResolveRequest, options?: StoreCallOptions): Promise<ResolvedState>;
}

const firstValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

const hasFlag = (query: QueryParams, name: string): boolean =>
  Object.prototype.hasOwnProperty.call(query, name) && query[name] !== undefined;

const stripLeading = (path: string, delimiter: string): string => {
  let start = 0;
  while (path.startsWith(delimiter, start)) start += delimiter.length;
  return path.slice(start);
};

export function createPathResolver(options: PathResolverOptions): PathResolver {
  const { store, cache, viewConcurrency, pageSize } = options;
  const reserved = new Set<string>(options.reservedSegments ?? DEFAULT_RESERVED_SEGMENTS);
  const logger = options.logger ?? silentLogger;
  const metrics = options.metrics ?? createNoopVfsMetrics();

  const settle = (state: ResolvedState): ResolvedState => {
    metrics.resolutions.inc({ kind: state.kind, reason: "reason" in state ? state.reason : undefined });
    return state;
  };

  return {
    async resolve(request, callOptions = {}) {
      const { path } = request;
      const query = request.query ?? {};

      const legacy = firstValue(query[LEGACY_PATH_PARAM]);
      if (path === "" && legacy !== undefined) {
        let target = stripLeading(legacy, store.delimiter);
        // land on the canonical directory form in one hop
        if (target !== "" && !isDirectoryPath(target, store.delimiter)) {
          const classification = await classifyPath(store, target, callOptions);
          if (classification.state === "IS_DIR_NO_SLASH") target = classification.canonical;
        }
        return settle({
          kind: "redirect",
          target,
          permanent: true,
          reason: "legacy_query",
        });
      }

      if (path !== "" && reserved.has(firstSegment(path, store.delimiter))) {
        return settle({ kind: "not_found", state: "NOT_FOUND", reason: "reserved" });
      }

      const classification = await classifyPath(store, path, callOptions);
      logger.debug({ path, state: classification.state }, "path_classified");

      switch (classification.state) {
        case "IS_DIR": {
          const view = await buildDirectoryView(store, cache, path, {
            ...callOptions,
            concurrency: viewConcurrency,
            pageSize,
          });
          return settle({ kind: "directory", state: "IS_DIR", view });
        }
        case "IS_DIR_NO_SLASH":
          return settle({
            kind: "redirect",
            target: classification.canonical,
            permanent: false,
            reason: "missing_delimiter",
          });
        case "NOT_FOUND":
          return settle({ kind: "not_found", state: "NOT_FOUND", reason: "missing" });
        case "IS_FILE": {
          const { meta } = classification;
          if (!hasFlag(query, INLINE_MARKER)) {
            return settle({ kind: "file", state: "IS_FILE", meta, inline: false });
          }
          if (isJsonObject(meta)) {
            return settle({ kind: "file", state: "IS_FILE", meta, inline: true });
          }
          return settle({ kind: "redirect", target: path, permanent: false, reason: "inline_marker" });
        }
      }
    },
  };
}
