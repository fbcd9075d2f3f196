export type Labels = Record<string, string | number | boolean | undefined>;

/** Minimal counter port; the service binds it to prom-client. */
export interface Counter {
  inc(labels?: Labels, value?: number): void;
}

export interface Histogram {
  observe(labels: Labels | undefined, valueMs: number): void;
}

/** Store call instrumentation. Every series carries `op` and `adapter`. */
export interface StorageMetrics {
  requestsTotal: Counter;
  /** Adds `code`. */
  errorsTotal: Counter;
  /** Adds `code` of the failure that was retried. */
  retriesTotal: Counter;
  latencyMs: Histogram;
  /** Entries returned by listing calls, prefixes included. */
  objectsListedTotal: Counter;
  circuitBreakerTransitions: Counter;
}

export function createNoopStorageMetrics(): StorageMetrics {
  const counter: Counter = { inc: () => undefined };
  return {
    requestsTotal: counter,
    errorsTotal: counter,
    retriesTotal: counter,
    latencyMs: { observe: () => undefined },
    objectsListedTotal: counter,
    circuitBreakerTransitions: counter,
  };
}

export type RecordedCall = { labels?: Labels; value?: number };

export function createRecordingStorageMetrics() {
  const calls: Record<keyof StorageMetrics, RecordedCall[]> = {
    requestsTotal: [],
    errorsTotal: [],
    retriesTotal: [],
    latencyMs: [],
    objectsListedTotal: [],
    circuitBreakerTransitions: [],
  };
  const counter = (name: keyof StorageMetrics): Counter => ({
    inc: (labels, value) => void calls[name].push({ labels, value }),
  });

  const metrics: StorageMetrics = {
    requestsTotal: counter("requestsTotal"),
    errorsTotal: counter("errorsTotal"),
    retriesTotal: counter("retriesTotal"),
    latencyMs: { observe: (labels, value) => void calls.latencyMs.push({ labels, value }) },
    objectsListedTotal: counter("objectsListedTotal"),
    circuitBreakerTransitions: counter("circuitBreakerTransitions"),
  };
  return { metrics, calls };
}
