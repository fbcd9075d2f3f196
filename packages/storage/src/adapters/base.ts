import type {
  ChildListingPage,
  ListPageQuery,
  ObjectContent,
  ObjectListingPage,
  ObjectProbe,
  StoreCallOptions,
  StoreHealthStatus,
} from "../types";

export interface AdapterInitOptions {
  signal?: AbortSignal;
}

/**
 * Read-only view of a flat, prefix-addressed object store.
 *
 * Browsing issues only `listChildrenPage` (one delimiter level); only aggregation
 * walks a subtree with `listRecursivePage`.
 */
export interface ObjectStoreAdapter {
  readonly kind: "s3" | "memory";
  readonly delimiter: string;
  /** Identifier of the backing namespace, e.g. `s3://bucket`. */
  readonly source: string;
  init(options?: AdapterInitOptions): Promise<void>;
  listChildrenPage(query: ListPageQuery, options?: StoreCallOptions): Promise<ChildListingPage>;
  listRecursivePage(query: ListPageQuery, options?: StoreCallOptions): Promise<ObjectListingPage>;
  /** Resolves `undefined` when no object has exactly this key. */
  probeObject(key: string, options?: StoreCallOptions): Promise<ObjectProbe | undefined>;
  getObject(key: string, options?: StoreCallOptions): Promise<ObjectContent>;
  issueTemporaryUrl(key: string, ttlSeconds: number, options?: StoreCallOptions): Promise<string>;
  healthCheck?(options?: StoreCallOptions): Promise<StoreHealthStatus>;
  dispose?(): Promise<void>;
}
