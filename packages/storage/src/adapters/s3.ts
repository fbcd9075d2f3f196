import { performance } from "node:perf_hooks";
import {
  S3Client,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3ServiceException,
  type _Object,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { AdapterInitOptions, ObjectStoreAdapter } from "./base";
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
import {
  AbortedError,
  CircuitOpenError,
  NotFoundError,
  PermanentAdapterError,
  StorageError,
  TimeoutError,
  TransientAdapterError,
  isTransientStorageError,
} from "../errors";
import { retry } from "../utils/retry";
import { CircuitBreaker } from "../utils/circuitBreaker";
import { createDeadline, type Deadline } from "../utils/deadline";
import { createNoopStorageLogger, type StorageLogger } from "../observability/logs";
import { createNoopStorageMetrics, type StorageMetrics } from "../observability/metrics";

export interface S3AdapterOptions {
  bucket: string;
  clientConfig?: S3ClientConfig;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  delimiter?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  logger?: StorageLogger;
  metrics?: StorageMetrics;
}

type CallFields = { key?: string; prefix?: string };

export class S3ObjectStoreAdapter implements ObjectStoreAdapter {
  public readonly kind = "s3" as const;
  public readonly delimiter: string;
  public readonly source: string;

  private readonly options: S3AdapterOptions;
  private client: S3Client;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly logger: StorageLogger;
  private readonly metrics: StorageMetrics;

  constructor(options: S3AdapterOptions) {
    this.options = options;
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.source = `s3://${options.bucket}`;
    this.logger = options.logger ?? createNoopStorageLogger();
    this.metrics = options.metrics ?? createNoopStorageMetrics();
    this.client = new S3Client({
      forcePathStyle: options.forcePathStyle,
      region: options.region,
      endpoint: options.endpoint,
      ...options.clientConfig,
    });
    this.circuitBreaker = new CircuitBreaker({
      failureThreshold: 5,
      successThreshold: 1,
      resetTimeoutMs: 5_000,
      onTransition: (state) => {
        this.metrics.circuitBreakerTransitions.inc({ adapter: this.kind, state });
        this.logger.warn({ op: "circuit_transition", source: this.source, durationMs: 0, state });
      },
    });
  }

  async init(options?: AdapterInitOptions): Promise<void> {
    await this.execute("head_bucket", { signal: options?.signal }, async (abortSignal) => {
      await this.client.send(new HeadBucketCommand({ Bucket: this.options.bucket }), { abortSignal });
    });
  }

  async listChildrenPage(query: ListPageQuery, options: StoreCallOptions = {}): Promise<ChildListingPage> {
    const result = await this.execute(
      "list_children",
      options,
      (abortSignal) =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.options.bucket,
            Prefix: query.prefix || undefined,
            Delimiter: this.delimiter,
            ContinuationToken: query.cursor,
            MaxKeys: query.maxKeys,
          }),
          { abortSignal }
        ),
      { prefix: query.prefix }
    );

    const prefixes = (result.CommonPrefixes ?? []).flatMap((entry) => (entry.Prefix ? [entry.Prefix] : []));
    const objects = this.toObjectMetas(result.Contents);
    this.metrics.objectsListedTotal.inc({ op: "list_children" }, prefixes.length + objects.length);

    return {
      prefixes,
      objects,
      nextCursor: result.IsTruncated ? result.NextContinuationToken : undefined,
    };
  }

  async listRecursivePage(query: ListPageQuery, options: StoreCallOptions = {}): Promise<ObjectListingPage> {
    const result = await this.execute(
      "list_recursive",
      options,
      (abortSignal) =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.options.bucket,
            Prefix: query.prefix || undefined,
            ContinuationToken: query.cursor,
            MaxKeys: query.maxKeys,
          }),
          { abortSignal }
        ),
      { prefix: query.prefix }
    );

    const objects = this.toObjectMetas(result.Contents);
    this.metrics.objectsListedTotal.inc({ op: "list_recursive" }, objects.length);

    return {
      objects,
      nextCursor: result.IsTruncated ? result.NextContinuationToken : undefined,
    };
  }

  async probeObject(key: string, options: StoreCallOptions = {}): Promise<ObjectProbe | undefined> {
    return this.execute(
      "head_object",
      options,
      async (abortSignal) => {
        try {
          const result = await this.client.send(
            new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }),
            { abortSignal }
          );
          return {
            key,
            size: result.ContentLength ?? 0,
            lastModified: result.LastModified ?? new Date(0),
            contentType: result.ContentType,
            etag: this.stripQuotes(result.ETag),
          };
        } catch (error) {
          if (this.isMissingKey(error)) return undefined;
          throw error;
        }
      },
      { key }
    );
  }

  async getObject(key: string, options: StoreCallOptions = {}): Promise<ObjectContent> {
    return this.execute(
      "get_object",
      options,
      async (abortSignal) => {
        const result = await this.client.send(
          new GetObjectCommand({ Bucket: this.options.bucket, Key: key }),
          { abortSignal }
        );
        if (!result.Body) {
          throw new StorageError("S3 object stream missing", { code: "UNKNOWN", metadata: { key } });
        }
        const body = await result.Body.transformToString("utf-8");
        return {
          meta: {
            key,
            size: result.ContentLength ?? Buffer.byteLength(body),
            lastModified: result.LastModified ?? new Date(0),
            contentType: result.ContentType,
            etag: this.stripQuotes(result.ETag),
          },
          body,
        };
      },
      { key }
    );
  }

  async issueTemporaryUrl(key: string, ttlSeconds: number, options: StoreCallOptions = {}): Promise<string> {
    return this.execute(
      "presign_get",
      options,
      () =>
        getSignedUrl(this.client, new GetObjectCommand({ Bucket: this.options.bucket, Key: key }), {
          expiresIn: ttlSeconds,
        }),
      { key }
    );
  }

  async healthCheck(options: StoreCallOptions = {}): Promise<StoreHealthStatus> {
    try {
      await this.init({ signal: options.signal });
      return { healthy: true };
    } catch (error) {
      return { healthy: false, details: { code: error instanceof StorageError ? error.code : "UNKNOWN" } };
    }
  }

  async dispose(): Promise<void> {
    this.client.destroy();
  }

  private toObjectMetas(contents: _Object[] | undefined): ObjectMeta[] {
    return (contents ?? []).flatMap((item) =>
      item.Key
        ? [{ key: item.Key, size: item.Size ?? 0, lastModified: item.LastModified ?? new Date(0) }]
        : []
    );
  }

  private async execute<T>(
    operation: string,
    options: StoreCallOptions,
    fn: (abortSignal: AbortSignal) => Promise<T>,
    fields: CallFields = {}
  ): Promise<T> {
    const labels = { op: operation, adapter: this.kind };
    const started = performance.now();

    const run = async (): Promise<T> => {
      if (!this.circuitBreaker.shouldAllow()) {
        throw new CircuitOpenError(`S3 circuit open for ${operation}`, { operation });
      }
      const deadline = createDeadline({
        signal: options.signal,
        timeoutMs: options.timeoutMs ?? this.options.timeoutMs,
      });
      try {
        const result = await fn(deadline.signal);
        this.circuitBreaker.recordSuccess();
        return result;
      } catch (error) {
        const mapped = this.mapS3Error(error, operation, deadline, options.signal);
        if (isTransientStorageError(mapped)) {
          this.circuitBreaker.recordFailure();
        }
        throw mapped;
      } finally {
        deadline.dispose();
      }
    };

    try {
      const result = await retry(run, {
        attempts: this.options.retryAttempts ?? 3,
        baseDelayMs: 200,
        maxDelayMs: 2_000,
        signal: options.signal,
        shouldRetry: (error) => isTransientStorageError(error) && !(error instanceof CircuitOpenError),
        onRetry: (error, attempt) => {
          const code = error instanceof StorageError ? error.code : "UNKNOWN";
          this.metrics.retriesTotal.inc({ ...labels, code });
          this.logger.debug({ op: operation, source: this.source, durationMs: performance.now() - started, code, attempt, ...fields });
        },
      });
      const durationMs = performance.now() - started;
      this.metrics.requestsTotal.inc(labels);
      this.metrics.latencyMs.observe(labels, durationMs);
      this.logger.debug({ op: operation, source: this.source, durationMs, ...fields });
      return result;
    } catch (error) {
      const code = error instanceof StorageError ? error.code : "UNKNOWN";
      this.metrics.errorsTotal.inc({ ...labels, code });
      this.logger.warn({ op: operation, source: this.source, durationMs: performance.now() - started, code, ...fields });
      throw error;
    }
  }

  private mapS3Error(error: unknown, operation: string, deadline: Deadline, upstream?: AbortSignal): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    if (upstream?.aborted) {
      return new AbortedError(`S3 ${operation} aborted by caller`, { operation });
    }
    if (deadline.timedOut()) {
      return new TimeoutError(`S3 ${operation} timed out`, { operation });
    }
    if (error instanceof S3ServiceException) {
      const status = error.$metadata?.httpStatusCode;
      if (this.isMissingKey(error)) {
        return new NotFoundError("S3 object not found", { operation });
      }
      if (error.$retryable?.throttling || error.$fault === "server" || (status !== undefined && status >= 500)) {
        return new TransientAdapterError(`S3 ${operation} failed`, { operation, status }, error);
      }
      return new PermanentAdapterError(`S3 ${operation} rejected`, { operation, status }, error);
    }
    if (error instanceof Error) {
      // network-level failure (socket reset, DNS); retryable
      return new TransientAdapterError(`S3 ${operation} failed`, { operation }, error);
    }
    return new StorageError("Unknown S3 error", { code: "UNKNOWN", cause: error, metadata: { operation } });
  }

  private isMissingKey(error: unknown): boolean {
    if (!(error instanceof S3ServiceException)) return false;
    return error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata?.httpStatusCode === 404;
  }

  private stripQuotes(value?: string): string | undefined {
    if (!value) return undefined;
    return value.replace(/^"|"$/g, "");
  }
}
