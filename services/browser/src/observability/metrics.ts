import { Counter, Gauge, Histogram, register } from 'prom-client';
import type { Counter as PortCounter, Histogram as PortHistogram, Labels, StorageMetrics } from '@keyspace/storage';
import type { VfsMetrics } from '@keyspace/vfs';

register.setDefaultLabels({ service: 'browser' });

export const requestTotalCounter = new Counter({
  name: 'browser_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['route', 'method'] as const
});

export const requestDurationHistogram = new Histogram({
  name: 'browser_request_duration_ms',
  help: 'HTTP request duration in milliseconds',
  labelNames: ['route', 'method', 'status_code'] as const,
  buckets: [10, 20, 50, 100, 200, 500, 1000, 5000]
});

export const snapshotLoadedGauge = new Gauge({
  name: 'browser_metrics_snapshot_loaded',
  help: '1 while a metrics snapshot is loaded'
});

export const snapshotAgeGauge = new Gauge({
  name: 'browser_metrics_snapshot_age_seconds',
  help: 'Seconds since the loaded metrics snapshot was computed'
});

export const snapshotPrefixesGauge = new Gauge({
  name: 'browser_metrics_snapshot_prefixes',
  help: 'Prefixes recorded in the loaded metrics snapshot'
});

const resolutionsCounter = new Counter<string>({
  name: 'browser_resolutions_total',
  help: 'Path resolutions by outcome',
  labelNames: ['kind', 'reason']
});

const statsLookupsCounter = new Counter<string>({
  name: 'browser_stats_lookups_total',
  help: 'Directory stats lookups by source and miss reason',
  labelNames: ['source', 'reason']
});

const rebuildsCounter = new Counter<string>({
  name: 'browser_metrics_rebuilds_total',
  help: 'Metrics snapshot rebuild runs by outcome',
  labelNames: ['outcome']
});

const rebuildDurationHistogram = new Histogram<string>({
  name: 'browser_metrics_rebuild_duration_ms',
  help: 'Metrics snapshot rebuild duration in milliseconds',
  buckets: [1_000, 10_000, 60_000, 300_000, 1_800_000]
});

const rebuildFailedPrefixesCounter = new Counter<string>({
  name: 'browser_metrics_rebuild_failed_prefixes_total',
  help: 'Prefixes left out of a rebuilt snapshot after a store failure'
});

const storeRequestsCounter = new Counter<string>({
  name: 'browser_store_requests_total',
  help: 'Successful object store calls',
  labelNames: ['op', 'adapter']
});

const storeErrorsCounter = new Counter<string>({
  name: 'browser_store_errors_total',
  help: 'Failed object store calls',
  labelNames: ['op', 'adapter', 'code']
});

const storeRetriesCounter = new Counter<string>({
  name: 'browser_store_retries_total',
  help: 'Object store call retries',
  labelNames: ['op', 'adapter', 'code']
});

const storeLatencyHistogram = new Histogram<string>({
  name: 'browser_store_latency_ms',
  help: 'Object store call latency in milliseconds',
  labelNames: ['op', 'adapter'],
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500]
});

const storeObjectsListedCounter = new Counter<string>({
  name: 'browser_store_objects_listed_total',
  help: 'Entries returned by object store listings',
  labelNames: ['op']
});

const storeCircuitCounter = new Counter<string>({
  name: 'browser_store_circuit_transitions_total',
  help: 'Object store circuit breaker transitions',
  labelNames: ['adapter', 'state']
});

const toLabelValues = (labels: Labels | undefined) => {
  const values: Record<string, string | number> = {};
  for (const [name, value] of Object.entries(labels ?? {})) {
    if (value === undefined) continue;
    values[name] = typeof value === 'boolean' ? String(value) : value;
  }
  return values;
};

const counterPort = (counter: Counter<string>): PortCounter => ({
  inc: (labels, value) => counter.inc(toLabelValues(labels), value ?? 1)
});

const histogramPort = (histogram: Histogram<string>): PortHistogram => ({
  observe: (labels, value) => histogram.observe(toLabelValues(labels), value)
});

export const storageMetrics: StorageMetrics = {
  requestsTotal: counterPort(storeRequestsCounter),
  errorsTotal: counterPort(storeErrorsCounter),
  retriesTotal: counterPort(storeRetriesCounter),
  latencyMs: histogramPort(storeLatencyHistogram),
  objectsListedTotal: counterPort(storeObjectsListedCounter),
  circuitBreakerTransitions: counterPort(storeCircuitCounter)
};

export const vfsMetrics: VfsMetrics = {
  statsLookups: counterPort(statsLookupsCounter),
  resolutions: counterPort(resolutionsCounter),
  rebuilds: counterPort(rebuildsCounter),
  rebuildDurationMs: histogramPort(rebuildDurationHistogram),
  rebuildFailedPrefixes: counterPort(rebuildFailedPrefixesCounter)
};
