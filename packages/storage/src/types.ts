export const DEFAULT_DELIMITER = "/";

export interface ObjectMeta {
  key: string;
  size: number;
  lastModified: Date;
}

export interface ObjectProbe extends ObjectMeta {
  contentType?: string;
  etag?: string;
}

export interface ObjectContent {
  meta: ObjectProbe;
  body: string;
}

export interface ListPageQuery {
  prefix: string;
  cursor?: string;
  maxKeys?: number;
}

export interface ChildListingPage {
  prefixes: string[];
  objects: ObjectMeta[];
  nextCursor?: string;
}

export interface ObjectListingPage {
  objects: ObjectMeta[];
  nextCursor?: string;
}

export interface ChildListing {
  prefixes: string[];
  objects: ObjectMeta[];
}

export interface StoreCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface StoreHealthStatus {
  healthy: boolean;
  details?: Record<string, unknown>;
}
