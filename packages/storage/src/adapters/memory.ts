import type { ObjectStoreAdapter } from "./base";
import type {
  ChildListingPage,
  ListPageQuery,
  ObjectContent,
  ObjectListingPage,
  ObjectMeta,
  ObjectProbe,
  StoreCallOptions,
  StoreHealthStatus,
} from "../types";
import { DEFAULT_DELIMITER } from "../types";
import { AbortedError, NotFoundError, StorageError } from "../errors";

export interface MemoryObjectInput {
  size?: number;
  body?: string;
  lastModified?: Date;
  contentType?: string;
}

export interface MemoryAdapterOptions {
  name?: string;
  delimiter?: string;
  /** Upper bound on entries per page, mirroring the S3 limit of 1000. */
  pageSize?: number;
  urlBase?: string;
  now?: () => Date;
}

interface StoredObject {
  meta: ObjectProbe;
  body: string;
}

type Marker = { kind: "prefix" | "object"; value: string };

const encodeCursor = (marker: Marker): string => Buffer.from(JSON.stringify(marker), "utf8").toString("base64url");

const decodeCursor = (cursor: string | undefined): Marker | undefined => {
  if (!cursor) return undefined;
  try {
    const parsed: unknown = JSON.parse(Buffer.from(cursor, "base64url").toString("utf8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "kind" in parsed &&
      "value" in parsed &&
      (parsed.kind === "prefix" || parsed.kind === "object") &&
      typeof parsed.value === "string"
    ) {
      return { kind: parsed.kind, value: parsed.value };
    }
  } catch (error) {
    throw new StorageError("Malformed continuation token", { code: "PERMANENT_ADAPTER_ERROR", cause: error });
  }
  throw new StorageError("Malformed continuation token", { code: "PERMANENT_ADAPTER_ERROR" });
};

export class InMemoryObjectStoreAdapter implements ObjectStoreAdapter {
  public readonly kind = "memory" as const;
  public readonly delimiter: string;
  public readonly source: string;

  private readonly objects = new Map<string, StoredObject>();
  private sortedKeys: string[] | null = null;
  private readonly pageSize: number;
  private readonly urlBase: string;
  private readonly now: () => Date;

  constructor(options: MemoryAdapterOptions = {}) {
    const name = options.name ?? "local";
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.source = `memory://${name}`;
    this.pageSize = options.pageSize ?? 1000;
    this.urlBase = options.urlBase ?? `memory://${name}`;
    this.now = options.now ?? (() => new Date());
  }

  put(key: string, input: MemoryObjectInput = {}): ObjectProbe {
    const body = input.body ?? "";
    const meta: ObjectProbe = {
      key,
      size: input.size ?? Buffer.byteLength(body, "utf8"),
      lastModified: input.lastModified ?? this.now(),
      contentType: input.contentType,
    };
    this.objects.set(key, { meta, body });
    this.sortedKeys = null;
    return { ...meta };
  }

  remove(key: string): boolean {
    const removed = this.objects.delete(key);
    if (removed) this.sortedKeys = null;
    return removed;
  }

  clear(): void {
    this.objects.clear();
    this.sortedKeys = null;
  }

  keys(): string[] {
    return [...this.sorted()];
  }

  async init(): Promise<void> {}

  async listChildrenPage(query: ListPageQuery, options: StoreCallOptions = {}): Promise<ChildListingPage> {
    this.assertActive(options);
    const limit = this.limitFor(query.maxKeys);
    const marker = decodeCursor(query.cursor);
    const prefixes: string[] = [];
    const objects: ObjectMeta[] = [];
    let last: Marker | undefined;
    let truncated = false;

    for (const key of this.sorted()) {
      if (!key.startsWith(query.prefix) || this.isBeforeMarker(key, marker)) continue;

      const rest = key.slice(query.prefix.length);
      const cut = rest.indexOf(this.delimiter);
      const entry: Marker =
        cut >= 0
          ? { kind: "prefix", value: query.prefix + rest.slice(0, cut + 1) }
          : { kind: "object", value: key };
      if (entry.kind === "prefix" && last?.kind === "prefix" && last.value === entry.value) continue;

      if (prefixes.length + objects.length >= limit) {
        truncated = true;
        break;
      }
      if (entry.kind === "prefix") {
        prefixes.push(entry.value);
      } else {
        objects.push(this.metaOf(key));
      }
      last = entry;
    }

    return { prefixes, objects, nextCursor: truncated && last ? encodeCursor(last) : undefined };
  }

  async listRecursivePage(query: ListPageQuery, options: StoreCallOptions = {}): Promise<ObjectListingPage> {
    this.assertActive(options);
    const limit = this.limitFor(query.maxKeys);
    const marker = decodeCursor(query.cursor);
    const objects: ObjectMeta[] = [];
    let truncated = false;

    for (const key of this.sorted()) {
      if (!key.startsWith(query.prefix) || this.isBeforeMarker(key, marker)) continue;
      if (objects.length >= limit) {
        truncated = true;
        break;
      }
      objects.push(this.metaOf(key));
    }

    const tail = objects[objects.length - 1];
    return {
      objects,
      nextCursor: truncated && tail ? encodeCursor({ kind: "object", value: tail.key }) : undefined,
    };
  }

  async probeObject(key: string, options: StoreCallOptions = {}): Promise<ObjectProbe | undefined> {
    this.assertActive(options);
    const stored = this.objects.get(key);
    return stored ? { ...stored.meta } : undefined;
  }

  async getObject(key: string, options: StoreCallOptions = {}): Promise<ObjectContent> {
    this.assertActive(options);
    const stored = this.objects.get(key);
    if (!stored) {
      throw new NotFoundError("Memory object not found", { key });
    }
    return { meta: { ...stored.meta }, body: stored.body };
  }

  async issueTemporaryUrl(key: string, ttlSeconds: number, options: StoreCallOptions = {}): Promise<string> {
    this.assertActive(options);
    const path = key.split(this.delimiter).map(encodeURIComponent).join("/");
    return `${this.urlBase}/${path}?expires_in=${ttlSeconds}`;
  }

  async healthCheck(): Promise<StoreHealthStatus> {
    return { healthy: true, details: { objects: this.objects.size } };
  }

  async dispose(): Promise<void> {
    this.clear();
  }

  private sorted(): string[] {
    this.sortedKeys ??= [...this.objects.keys()].sort();
    return this.sortedKeys;
  }

  private metaOf(key: string): ObjectMeta {
    const stored = this.objects.get(key);
    if (!stored) {
      throw new NotFoundError("Memory object not found", { key });
    }
    const { size, lastModified } = stored.meta;
    return { key, size, lastModified };
  }

  private isBeforeMarker(key: string, marker: Marker | undefined): boolean {
    if (!marker) return false;
    if (key <= marker.value) return true;
    return marker.kind === "prefix" && key.startsWith(marker.value);
  }

  private limitFor(maxKeys: number | undefined): number {
    return maxKeys && maxKeys > 0 ? Math.min(maxKeys, this.pageSize) : this.pageSize;
  }

  private assertActive(options: StoreCallOptions): void {
    if (options.signal?.aborted) {
      throw new AbortedError("Memory store call aborted", { source: this.source });
    }
  }
}
